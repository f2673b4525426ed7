import { z } from "zod/mini"
import { jobKinds } from "../model/job.model"

export const submitJobRequestSchema = z.object({
  subject_id: z.string({ error: "subject_id is required" }),
  job_kind: z.enum(jobKinds, { error: "Unsupported job kind" }),
  input: z.object({
    reference: z.string({ error: "input.reference is required" }),
    metadata: z.optional(z.record(z.string(), z.unknown())),
  }),
})

export type SubmitJobRequest = z.infer<typeof submitJobRequestSchema>
