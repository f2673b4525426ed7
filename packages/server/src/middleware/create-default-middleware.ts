import type { Logger } from "@conduit/logger"
import type { MiddlewareHandler } from "hono"
import type { ResolvedServerOptions } from "../server/server-options"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"

export function createDefaultMiddleware(
  options: ResolvedServerOptions,
  logger: Logger,
): MiddlewareHandler[] {
  const middleware: MiddlewareHandler[] = []

  if (options.requestId.enabled) {
    middleware.push(requestIdMiddleware(options.requestId))
  }

  middleware.push(requestLoggerMiddleware(logger))

  if (options.requestLogging.enabled) {
    middleware.push(requestLoggingMiddleware(options.requestLogging, logger))
  }

  return middleware
}

export type CreateDefaultMiddlewareFn = typeof createDefaultMiddleware
