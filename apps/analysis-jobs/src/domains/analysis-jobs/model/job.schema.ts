import { z } from "zod/mini"
import { jobKinds } from "./job.model"

const identifier = (label: string) =>
  z
    .string()
    .check(
      z.trim(),
      z.minLength(1, { error: `${label} cannot be empty` }),
      z.maxLength(128, { error: `${label} cannot exceed 128 characters` }),
    )

export const jobInputSchema = z.object({
  reference: z.url({ error: "reference must be a URL the analysis service can fetch" }),
  metadata: z.optional(z.record(z.string(), z.unknown())),
})

export const submitJobInputSchema = z.object({
  tenantId: identifier("tenantId"),
  subjectId: identifier("subjectId"),
  kind: z.enum(jobKinds, { error: "Unsupported job kind" }),
  input: jobInputSchema,
})

export type SubmitJobInput = z.input<typeof submitJobInputSchema>
