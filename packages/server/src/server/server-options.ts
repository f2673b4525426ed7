import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@conduit/clock"
import type { Logger, LogLevelName } from "@conduit/logger"
import type { ErrorHandler, Hono, MiddlewareHandler } from "hono"
import type { ErrorMappingsConfig } from "../errors/errors"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /** @default "x-request-id" */
  header?: string

  /** @default crypto.randomUUID() */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * 5xx responses always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /** @default the health paths when health is enabled */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  /** Run on every readiness request. @default [] */
  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: Milliseconds
}

export type ErrorHandling =
  | { kind: "handler"; errorHandler: ErrorHandler }
  | { kind: "mappings"; config: ErrorMappingsConfig }

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** @default 2_147_483_647 (no timeout) */
  startupTimeoutMs?: Milliseconds

  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  errorHandling: ErrorHandling

  routes: (app: Hono) => void

  middleware?: {
    pre?: MiddlewareHandler[]
    post?: MiddlewareHandler[]
  }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>

export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>

export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorHandling: ErrorHandling
  routes: (app: Hono) => void
  middleware: { pre: MiddlewareHandler[]; post: MiddlewareHandler[] }
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export const DEFAULTS = {
  host: "0.0.0.0",
  startupTimeoutMs: 2_147_483_647,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
    generate: () => randomUUID(),
  },
  requestLoggingLevel: "info",
  health: {
    enabled: true,
    livenessPath: "/health",
    readinessPath: "/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
} satisfies {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Required<EnabledRequestIdConfig>
  requestLoggingLevel: LogLevelName
  health: Required<EnabledHealthConfig>
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health: ResolvedHealthConfig =
    options.health?.enabled === false
      ? { enabled: false }
      : { ...DEFAULTS.health, ...options.health, enabled: true }

  const requestId: ResolvedRequestIdConfig =
    options.requestId?.enabled === false
      ? { enabled: false }
      : { ...DEFAULTS.requestId, ...options.requestId, enabled: true }

  const requestLogging: ResolvedRequestLoggingConfig =
    options.requestLogging?.enabled === false
      ? { enabled: false }
      : {
          enabled: true,
          level: options.requestLogging?.level ?? DEFAULTS.requestLoggingLevel,
          ignorePaths:
            options.requestLogging?.ignorePaths ??
            (health.enabled ? [health.livenessPath, health.readinessPath] : []),
        }

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId,
    requestLogging,
    health,
    errorHandling: options.errorHandling,
    routes: options.routes,
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}
