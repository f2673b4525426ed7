import type { Logger } from "@conduit/logger"
import { type Context, parseOrThrow, type RequestHandler } from "@conduit/server"
import type { AnalysisJobServices } from "../composition"
import type { CompletionOutcome } from "../model/completion.model"
import { toCompletionCandidate } from "../model/completion.model"
import { extractExternalJobId, toExternalJobState } from "../model/external-status"
import { JobError } from "../model/job.errors"
import { analysisWebhookSchema, SIGNATURE_HEADER, TIMESTAMP_HEADER } from "./webhook.api.schema"

export type WebhookResponse =
  | { outcome: "ignored"; reason: "unknown_job" | "not_terminal"; jobId?: string }
  | { outcome: CompletionOutcome; jobId: string }

const decoder = new TextDecoder()

/**
 * Completion notifications from the analysis service. The signature is
 * checked against the raw bytes before anything is parsed or read from the
 * job store.
 *
 * @remarks
 * Notifications for jobs this service does not know answer 200 so the sender
 * stops redelivering them.
 */
export function analysisWebhookHandler(
  { verifier, jobStore, coordinator }: AnalysisJobServices,
  logger: Logger,
): RequestHandler {
  return async (c: Context) => {
    const rawBody = new Uint8Array(await c.req.arrayBuffer())

    const verification = verifier.verify(
      rawBody,
      c.req.header(SIGNATURE_HEADER),
      c.req.header(TIMESTAMP_HEADER),
    )

    if (verification.kind === "rejected") {
      logger.warn("Webhook rejected", { reason: verification.reason })
      throw JobError.webhookRejected(verification.reason)
    }

    const body = parseOrThrow(analysisWebhookSchema, parseJson(rawBody))

    const externalJobId = extractExternalJobId(body)
    if (externalJobId === undefined) throw JobError.invalidWebhook("missing external job id")

    const job = await jobStore.findByExternalId(externalJobId)

    if (!job) {
      logger.info("Webhook for unknown job ignored", { externalJobId })
      return c.json<WebhookResponse>({ outcome: "ignored", reason: "unknown_job" })
    }

    if (body.tenant_id !== undefined && body.tenant_id !== job.tenantId) {
      throw JobError.tenantMismatch(job.id)
    }

    const candidate = toCompletionCandidate(toExternalJobState(body), "webhook", externalJobId)

    if (!candidate) {
      return c.json<WebhookResponse>({ outcome: "ignored", reason: "not_terminal", jobId: job.id })
    }

    const res = await coordinator.complete({ tenantId: job.tenantId, jobId: job.id }, candidate)

    return c.json<WebhookResponse>({ outcome: res.outcome, jobId: job.id })
  }
}

function parseJson(rawBody: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(rawBody))
  } catch {
    throw JobError.invalidWebhook("body must be a JSON document")
  }
}
