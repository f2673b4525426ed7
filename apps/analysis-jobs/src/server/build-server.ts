import {
  type Application,
  createServer,
  type LifecycleHook,
  type Server,
} from "@conduit/server"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.core.clock,
      logger: ctx.services.core.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorHandling: {
        kind: "mappings",
        config: {
          mappings: {
            validation_error: { status: 400, message: "Request validation failed" },
            invalid_submission: { status: 400, message: "Invalid job submission" },
            tenant_required: { status: 400, message: "Missing x-tenant-id header" },
            invalid_webhook: { status: 400, message: "Invalid webhook payload" },
            webhook_rejected: { status: 401, message: "Webhook authenticity check failed" },
            tenant_mismatch: { status: 403, message: "Tenant does not own this job" },
            job_not_found: { status: 404, message: "Job not found" },
            job_store_contention: { status: 503, message: "Job store busy, retry later" },
          },
          transformContext: (error) =>
            error.code === "invalid_submission" || error.code === "validation_error"
              ? { details: error.message }
              : undefined,
        },
      },

      requestId: ctx.config.requestId.enabled
        ? { enabled: true, header: ctx.config.requestId.header }
        : { enabled: false },

      requestLogging: ctx.config.requestLogging.enabled
        ? { enabled: true, level: ctx.config.requestLogging.level }
        : { enabled: false },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services)
      },

      startHooks,
      stopHooks,
    },
  )

  return { server, startHooks, stopHooks }
}
