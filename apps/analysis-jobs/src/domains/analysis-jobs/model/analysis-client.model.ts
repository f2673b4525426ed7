import { BaseError } from "@conduit/errors"
import type { ExternalJobState } from "./external-status"
import type { JobId, JobInput, JobKind } from "./job.model"

export type SubmitAnalysisRequest = {
  jobId: JobId
  tenantId: string
  subjectId: string
  kind: JobKind
  input: JobInput
}

export type SubmitAnalysisResponse = {
  externalJobId: string
}

/**
 * Boundary to the external analysis service. Calls are bounded by a timeout
 * and fail with AnalysisClientError.
 */
export interface AnalysisClient {
  submit(request: SubmitAnalysisRequest): Promise<SubmitAnalysisResponse>

  getStatus(externalJobId: string, tenantId: string): Promise<ExternalJobState>
}

export type AnalysisClientErrorCode =
  | "analysis_unavailable"
  | "analysis_timeout"
  | "analysis_rejected"
  | "analysis_bad_response"

export class AnalysisClientError extends BaseError<AnalysisClientErrorCode> {
  static unavailable(status: number | undefined, cause?: unknown): AnalysisClientError {
    return new AnalysisClientError("Analysis service unavailable", {
      code: "analysis_unavailable",
      context: { ...(status !== undefined && { status }) },
      cause,
      isRetryable: true,
    })
  }

  static timeout(timeoutMs: number): AnalysisClientError {
    return new AnalysisClientError(`Analysis service did not answer within ${timeoutMs}ms`, {
      code: "analysis_timeout",
      context: { timeoutMs },
      isRetryable: true,
    })
  }

  static rejected(status: number, detail: string): AnalysisClientError {
    return new AnalysisClientError(`Analysis service rejected the request (${status})`, {
      code: "analysis_rejected",
      context: { status, detail },
      isRetryable: false,
    })
  }

  static badResponse(reason: string): AnalysisClientError {
    return new AnalysisClientError(`Unexpected analysis service response: ${reason}`, {
      code: "analysis_bad_response",
      context: { reason },
      isRetryable: true,
    })
  }
}
