import { BaseError } from "@conduit/errors"

export type JobErrorCode =
  | "invalid_submission"
  | "tenant_required"
  | "job_not_found"
  | "tenant_mismatch"
  | "webhook_rejected"
  | "invalid_webhook"
  | "job_store_contention"

export class JobError extends BaseError<JobErrorCode> {
  static invalidSubmission(reason: string): JobError {
    return new JobError(`Invalid submission: ${reason}`, {
      code: "invalid_submission",
      context: { reason },
      isRetryable: false,
    })
  }

  static tenantRequired(): JobError {
    return new JobError("Missing tenant", {
      code: "tenant_required",
      isRetryable: false,
    })
  }

  static notFound(jobId: string): JobError {
    return new JobError("Job not found", {
      code: "job_not_found",
      context: { jobId },
      isRetryable: false,
    })
  }

  static tenantMismatch(jobId: string): JobError {
    return new JobError("Webhook tenant does not own the job", {
      code: "tenant_mismatch",
      context: { jobId },
      isRetryable: false,
    })
  }

  static webhookRejected(reason: string): JobError {
    return new JobError("Webhook authenticity check failed", {
      code: "webhook_rejected",
      context: { reason },
      isRetryable: false,
    })
  }

  static invalidWebhook(reason: string): JobError {
    return new JobError(`Invalid webhook payload: ${reason}`, {
      code: "invalid_webhook",
      context: { reason },
      isRetryable: false,
    })
  }

  static contention(key: string): JobError {
    return new JobError("Gave up after repeated concurrent modifications", {
      code: "job_store_contention",
      context: { key },
      isRetryable: true,
    })
  }
}
