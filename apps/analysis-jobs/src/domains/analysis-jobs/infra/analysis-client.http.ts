import type { Milliseconds } from "@conduit/clock"
import {
  type AnalysisClient,
  AnalysisClientError,
  type SubmitAnalysisRequest,
  type SubmitAnalysisResponse,
} from "../model/analysis-client.model"
import {
  type ExternalJobState,
  extractExternalJobId,
  toExternalJobState,
} from "../model/external-status"

export type HttpAnalysisClientDeps = {
  /** @default globalThis.fetch */
  fetch?: typeof fetch
}

export type HttpAnalysisClientConfig = {
  baseUrl: string
  apiKey?: string
  timeoutMs: Milliseconds

  /** Where the service should deliver completion webhooks. */
  callbackUrl?: string
}

type SendOptions = {
  method: "GET" | "POST"
  tenantId: string
  body?: string
}

const MAX_ERROR_DETAIL = 200

export class HttpAnalysisClient implements AnalysisClient {
  private readonly fetchFn: typeof fetch
  private readonly baseUrl: string

  public constructor(
    deps: HttpAnalysisClientDeps,
    private readonly config: HttpAnalysisClientConfig,
  ) {
    this.fetchFn = deps.fetch ?? globalThis.fetch
    this.baseUrl = config.baseUrl.replace(/\/+$/, "")
  }

  async submit(request: SubmitAnalysisRequest): Promise<SubmitAnalysisResponse> {
    const res = await this.send("/v1/jobs", {
      method: "POST",
      tenantId: request.tenantId,
      body: JSON.stringify({
        tenant_id: request.tenantId,
        subject_id: request.subjectId,
        job_kind: request.kind,
        input_reference: request.input.reference,
        client_reference: request.jobId,
        ...(request.input.metadata !== undefined && { metadata: request.input.metadata }),
        ...(this.config.callbackUrl !== undefined && {
          callback_url: this.config.callbackUrl,
        }),
      }),
    })

    if (!res.ok) throw await this.errorFor(res)

    const externalJobId = extractExternalJobId(await this.readJson(res))

    if (externalJobId === undefined) {
      throw AnalysisClientError.badResponse("submission response carries no job id")
    }

    return { externalJobId }
  }

  async getStatus(externalJobId: string, tenantId: string): Promise<ExternalJobState> {
    const res = await this.send(`/v1/jobs/${encodeURIComponent(externalJobId)}`, {
      method: "GET",
      tenantId,
    })

    if (res.status === 404) return { kind: "not_found" }
    if (!res.ok) throw await this.errorFor(res)

    return toExternalJobState(await this.readJson(res))
  }

  private async send(path: string, opts: SendOptions): Promise<Response> {
    const headers: Record<string, string> = {
      accept: "application/json",
      "x-tenant-id": opts.tenantId,
      ...(opts.body !== undefined && { "content-type": "application/json" }),
      ...(this.config.apiKey !== undefined && {
        authorization: `Bearer ${this.config.apiKey}`,
      }),
    }

    try {
      return await this.fetchFn(`${this.baseUrl}${path}`, {
        method: opts.method,
        headers,
        signal: AbortSignal.timeout(this.config.timeoutMs),
        ...(opts.body !== undefined && { body: opts.body }),
      })
    } catch (err) {
      if (err instanceof Error && err.name === "TimeoutError") {
        throw AnalysisClientError.timeout(this.config.timeoutMs)
      }

      throw AnalysisClientError.unavailable(undefined, err)
    }
  }

  private async errorFor(res: Response): Promise<AnalysisClientError> {
    if (res.status >= 500 || res.status === 429) {
      return AnalysisClientError.unavailable(res.status)
    }

    const detail = await res.text().catch(() => "")

    return AnalysisClientError.rejected(res.status, detail.slice(0, MAX_ERROR_DETAIL))
  }

  private async readJson(res: Response): Promise<Record<string, unknown>> {
    let body: unknown

    try {
      body = await res.json()
    } catch (err) {
      throw AnalysisClientError.badResponse(err instanceof Error ? err.message : "invalid json")
    }

    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      throw AnalysisClientError.badResponse("expected a JSON object")
    }

    return Object.fromEntries(Object.entries(body))
  }
}
