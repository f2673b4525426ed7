import type { Context } from "@conduit/server"
import { JobError } from "../model/job.errors"

export const TENANT_HEADER = "x-tenant-id"

export function requireTenant(c: Context): string {
  const tenantId = c.req.header(TENANT_HEADER)?.trim()
  if (!tenantId) throw JobError.tenantRequired()

  return tenantId
}

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>()
  } catch {
    throw JobError.invalidSubmission("body must be a JSON document")
  }
}
