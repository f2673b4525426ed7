import type { MiddlewareHandler } from "hono"
import type { EnabledRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

const MAX_INBOUND_ID_LENGTH = 128

/**
 * Reuses an inbound request id when it looks sane, otherwise generates one.
 * The id lands on the context and is echoed on the response.
 */
export function requestIdMiddleware(config: Required<EnabledRequestIdConfig>): MiddlewareHandler {
  return async (c, next) => {
    const inbound = c.req.header(config.header)

    const requestId =
      isNonEmptyString(inbound) && inbound.length <= MAX_INBOUND_ID_LENGTH
        ? inbound
        : config.generate()

    c.set("requestId", requestId)

    await next()

    if (!c.res.headers.has(config.header)) c.res.headers.set(config.header, requestId)
  }
}
