// tests/cadence/timeout.test.ts — Handler invocation under a clock-driven deadline

import { afterEach, describe, expect, it, vi } from "vitest"
import type { HandlerContext, JobHandler } from "../../src/cron/handler-registry.js"
import { runWithTimeout } from "../../src/cron/timeout.js"
import { gate } from "../helpers/fixtures.js"
import { ManualClock, flush } from "../helpers/manual-clock.js"

const ctx: Omit<HandlerContext, "signal"> = { jobId: "job-a", attempt: 1, scheduledAtMs: 0, params: {} }

afterEach(() => {
  vi.restoreAllMocks()
})

describe("runWithTimeout", () => {
  it("passes through a handler result and cancels the deadline", async () => {
    const clock = new ManualClock(100)
    const handler: JobHandler = async () => ({ outcome: "success", stats: { read: 3 } })

    const result = await runWithTimeout(handler, ctx, { clock, timeoutMs: 1_000, startedAtMs: 100 })

    expect(result).toEqual({ outcome: "success", error: undefined, endedAtMs: 100, stats: { read: 3 } })
    expect(clock.pendingTimers()).toBe(0)
  })

  it("treats a void result as success", async () => {
    const clock = new ManualClock()
    const result = await runWithTimeout(async () => {}, ctx, { clock, timeoutMs: 1_000, startedAtMs: 0 })
    expect(result.outcome).toBe("success")
  })

  it("fills in an error for a reported failure without one", async () => {
    const clock = new ManualClock()
    const result = await runWithTimeout(async () => ({ outcome: "failure" }), ctx, { clock, timeoutMs: 1_000, startedAtMs: 0 })
    expect(result).toMatchObject({ outcome: "failure", error: "handler reported failure" })
  })

  it("turns thrown errors into failures, sync or async", async () => {
    const clock = new ManualClock()
    const syncThrow: JobHandler = () => { throw new Error("sync boom") }
    const asyncThrow: JobHandler = async () => { throw new Error("async boom") }

    expect(await runWithTimeout(syncThrow, ctx, { clock, timeoutMs: 1_000, startedAtMs: 0 }))
      .toEqual({ outcome: "failure", error: "sync boom", endedAtMs: 0 })
    expect(await runWithTimeout(asyncThrow, ctx, { clock, timeoutMs: 1_000, startedAtMs: 0 }))
      .toEqual({ outcome: "failure", error: "async boom", endedAtMs: 0 })
  })

  it("times out at exactly the deadline, aborts the signal and ignores a late result", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    const clock = new ManualClock(0)
    const hold = gate()
    let signal: AbortSignal | undefined
    const handler: JobHandler = async (c) => {
      signal = c.signal
      await hold.promise
    }

    const pending = runWithTimeout(handler, ctx, { clock, timeoutMs: 500, startedAtMs: 0 })
    await clock.advance(800)

    expect(await pending).toEqual({ outcome: "timeout", error: "timed out after 500ms", endedAtMs: 500 })
    expect(signal?.aborted).toBe(true)

    hold.open()
    await flush()
    expect(warn).toHaveBeenCalledWith("[coordinator] job-a attempt 1 finished after its timeout; result ignored")
  })
})
