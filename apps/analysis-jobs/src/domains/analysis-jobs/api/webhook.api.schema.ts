import { z } from "zod/mini"

/**
 * Completion notification from the analysis service. Only the fields read
 * here are declared; the rest pass through for status mapping.
 */
export const analysisWebhookSchema = z.looseObject({
  tenant_id: z.optional(z.string()),
  status: z.optional(z.string()),
})

export type AnalysisWebhook = z.infer<typeof analysisWebhookSchema>

export const SIGNATURE_HEADER = "x-analysis-signature"
export const TIMESTAMP_HEADER = "x-analysis-timestamp"
