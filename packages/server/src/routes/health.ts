import type { Milliseconds } from "@conduit/clock"
import type { Hono } from "hono"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

type CheckResult = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Hono,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, { headers: NO_CACHE_HEADERS }))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) {
      return c.json(
        { ok: false, reason: "starting" },
        { status: 503, headers: NO_CACHE_HEADERS },
      )
    }

    for (const check of config.readinessChecks) {
      const res = await runCheck(check, check.timeoutMs ?? config.checkTimeoutMs)

      if (!res.ok) {
        return c.json(
          { ok: false, reason: res.reason },
          { status: 503, headers: NO_CACHE_HEADERS },
        )
      }
    }

    return c.json({ ok: true }, { headers: NO_CACHE_HEADERS })
  })
}

async function runCheck(check: ReadinessCheck, timeoutMs: Milliseconds): Promise<CheckResult> {
  const signal = AbortSignal.timeout(timeoutMs)

  try {
    const healthy = await check.fn(signal)

    if (signal.aborted) return { ok: false, reason: `${check.name}:timeout` }

    return healthy ? { ok: true } : { ok: false, reason: check.name }
  } catch {
    return { ok: false, reason: signal.aborted ? `${check.name}:timeout` : `${check.name}:error` }
  }
}
