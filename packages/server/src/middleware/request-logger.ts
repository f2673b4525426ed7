import type { Logger } from "@conduit/logger"
import type { MiddlewareHandler } from "hono"

/** Exposes a request-scoped child logger as `c.get("logger")`. */
export function requestLoggerMiddleware(baseLogger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const requestId = c.get("requestId")

    c.set("logger", requestId ? baseLogger.child({ requestId }) : baseLogger)

    await next()
  }
}
