import type { Logger } from "@conduit/logger"
import type { ErrorHandler } from "hono"
import { HTTPException } from "hono/http-exception"
import { routePath } from "hono/route"
import { isNonEmptyString } from "../middleware/utils/is-non-empty-string"
import type { ErrorHandling } from "../server/server-options"
import { createErrorFormatter, type ErrorMappingsConfig } from "./errors"

export function createErrorHandler(errorHandling: ErrorHandling, logger: Logger): ErrorHandler {
  return errorHandling.kind === "handler"
    ? errorHandling.errorHandler
    : buildErrorHandler(errorHandling.config, logger)
}

export type CreateErrorHandlerFn = typeof createErrorHandler

function buildErrorHandler(mappings: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const format = createErrorFormatter(mappings)

  return (err, c) => {
    // hono raises these for malformed requests (bad JSON and the like).
    if (err instanceof HTTPException) return err.getResponse()

    const requestId = c.get("requestId") ?? "unknown"
    const response = format(err, requestId)
    const matched = routePath(c)
    const route = isNonEmptyString(matched) ? matched : c.req.path
    const log = c.get("logger") ?? logger

    const meta = {
      method: c.req.method,
      route,
      op: `${c.req.method} ${route}`,
      status: response.error.status,
      code: response.error.code,
    }

    if (response.error.status >= 500) {
      log.error("Request failed", { ...meta, err })
    } else {
      log.info("Request failed", meta)
      log.debug("Request failed details", { ...meta, err })
    }

    return c.json(response, response.error.status)
  }
}
