// src/cron/timeout.ts — Run a handler under a deadline driven by the injected clock

import type { Clock } from "./clock.js"
import { errorMessage } from "./errors.js"
import type { HandlerContext, HandlerResult, JobHandler } from "./handler-registry.js"
import type { AttemptOutcome } from "./types.js"

export interface BoundedResult {
  outcome: AttemptOutcome
  error?: string
  endedAtMs: number
  stats?: Record<string, number>
}

/**
 * Invoke handler and settle with whichever comes first: its result or the
 * deadline. On timeout the attempt ends at exactly startedAtMs + timeoutMs,
 * the signal is aborted and a late result is only logged.
 */
export function runWithTimeout(
  handler: JobHandler,
  ctx: Omit<HandlerContext, "signal">,
  opts: { clock: Clock; timeoutMs: number; startedAtMs: number },
): Promise<BoundedResult> {
  const controller = new AbortController()

  return new Promise<BoundedResult>((resolve) => {
    let settled = false

    const cancelTimer = opts.clock.setTimer(() => {
      if (settled) return
      settled = true
      controller.abort()
      resolve({
        outcome: "timeout",
        error: `timed out after ${opts.timeoutMs}ms`,
        endedAtMs: opts.startedAtMs + opts.timeoutMs,
      })
    }, opts.timeoutMs)

    let invocation: Promise<HandlerResult | void>
    try {
      invocation = handler({ ...ctx, signal: controller.signal })
    } catch (err) {
      // synchronous throw from a non-async handler
      invocation = Promise.reject(err)
    }

    invocation.then(
      (raw) => {
        if (settled) {
          console.warn(`[coordinator] ${ctx.jobId} attempt ${ctx.attempt} finished after its timeout; result ignored`)
          return
        }
        settled = true
        cancelTimer()
        const result = normalize(raw)
        resolve({
          outcome: result.outcome,
          error: result.outcome === "failure" ? (result.error ?? "handler reported failure") : undefined,
          endedAtMs: opts.clock.now(),
          stats: result.stats,
        })
      },
      (err: unknown) => {
        if (settled) {
          console.warn(`[coordinator] ${ctx.jobId} attempt ${ctx.attempt} failed after its timeout: ${errorMessage(err)}`)
          return
        }
        settled = true
        cancelTimer()
        resolve({ outcome: "failure", error: errorMessage(err), endedAtMs: opts.clock.now() })
      },
    )
  })
}

function normalize(result: HandlerResult | void): HandlerResult {
  if (typeof result === "object" && result !== null) return result
  return { outcome: "success" }
}
