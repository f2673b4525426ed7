import type { Context as HonoContext, Handler, MiddlewareHandler } from "hono"
import { Hono } from "hono"
import { type CreateErrorHandlerFn, createErrorHandler } from "../errors/create-error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import { type CreateStopperFn, createStopper, type ServerHandle } from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import type { StopResult } from "../lifecycle/shutdown"
import { type ShutdownFn, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type Application = Hono
export type Router = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler
export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export function createRouter(): Router {
  return new Hono()
}

export class Server {
  private state: ServerState = "idle"
  private ready = false
  private app?: Application
  private runningServer?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {}

  /**
   * The fully wired application. Built once; tests drive it with
   * `app.request()` without binding a port.
   */
  build(): Application {
    this.app ??= this.collabs.buildApp({
      options: this.options,
      isReady: () => this.ready,
      errorHandler: this.collabs.createErrorHandler(
        this.options.errorHandling,
        this.deps.logger,
      ),
      defaultMiddleware: this.collabs.createDefaultMiddleware(this.options, this.deps.logger),
    })

    return this.app
  }

  setupProcessHandlers(): this {
    this.signalHandler ??= this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.runningServer?.stop() ?? this.noopStop(),
    })

    return this
  }

  /**
   * Runs start hooks, then binds. Throws if a hook fails or the startup
   * deadline passes; nothing is bound in that case.
   */
  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") {
      throw new Error("Server already started")
    }

    this.state = "starting"

    try {
      const started = await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!started.ok) {
        const failed = started.failures.map((f) => f.hook).join(", ")

        throw new Error(
          started.timedOut ? "Server startup timed out" : `Startup hooks failed: ${failed}`,
          { cause: started.failures[0]?.error },
        )
      }

      const server = this.collabs.listen(this.build(), this.options, this.deps.logger)

      const handle = this.collabs.createStopper({
        server,
        clock: this.deps.clock,
        logger: this.deps.logger,
        host: this.options.host,
        port: this.options.port,
        shutdownTimeoutMs: this.options.shutdownTimeoutMs,
        stopHooks: this.options.stopHooks,
        shutdown: this.collabs.onShutdown,
        setReady: (v) => {
          this.ready = v
        },
        onStop: () => this.signalHandler?.unregister(),
      })

      this.runningServer = handle
      this.ready = true
      this.state = "started"

      return handle
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }

  private async noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")

    return { ok: true, failures: [], timedOut: false }
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
