import { type ErrorHandler, Hono, type MiddlewareHandler } from "hono"
import { registerHealthRoutes } from "../routes/health"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  options: ResolvedServerOptions
  isReady: () => boolean
  defaultMiddleware: MiddlewareHandler[]
  errorHandler: ErrorHandler
}

/**
 * Health routes sit in front of all middleware and are never logged. Then
 * default middleware, `pre`, routes, `post`, error handler.
 */
export function buildApp(ctx: BuildAppContext): Hono {
  const { options } = ctx
  const app = new Hono()

  registerHealthRoutes(app, options.health, ctx.isReady)

  for (const mw of [...ctx.defaultMiddleware, ...options.middleware.pre]) app.use("*", mw)

  options.routes(app)

  for (const mw of options.middleware.post) app.use("*", mw)

  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp
