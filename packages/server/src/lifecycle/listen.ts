import { serve } from "@hono/node-server"
import type { Logger } from "@conduit/logger"
import type { Hono } from "hono"
import type { Closeable } from "./shutdown"

export function listen(
  app: Hono,
  address: { host: string; port: number },
  logger: Logger,
): Closeable {
  const server = serve({ fetch: app.fetch, port: address.port, hostname: address.host })

  logger.info(`Server listening on http://${address.host}:${address.port}`)

  return server
}

export type ListenFn = typeof listen
