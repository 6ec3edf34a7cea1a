// tests/helpers/manual-clock.ts — Deterministic clock for engine and coordinator tests

import type { CancelTimer, Clock } from "../../src/cron/clock.js"

interface PendingTimer {
  id: number
  atMs: number
  fn: () => void
}

/** Let queued promise chains and in-memory ledger writes settle. */
export async function flush(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve))
  }
}

export class ManualClock implements Clock {
  private current: number
  private timers: PendingTimer[] = []
  private nextId = 1

  constructor(startMs = 0) {
    this.current = startMs
  }

  now(): number {
    return this.current
  }

  setTimer(fn: () => void, delayMs: number): CancelTimer {
    const timer: PendingTimer = { id: this.nextId++, atMs: this.current + Math.max(0, delayMs), fn }
    this.timers.push(timer)
    return () => {
      this.timers = this.timers.filter((t) => t !== timer)
    }
  }

  /** Move time forward, firing due timers in order and settling work between them. */
  async advance(ms: number): Promise<void> {
    const target = this.current + ms
    await flush()
    for (;;) {
      this.timers.sort((a, b) => a.atMs - b.atMs || a.id - b.id)
      const next = this.timers[0]
      if (!next || next.atMs > target) break
      this.timers.shift()
      this.current = next.atMs
      next.fn()
      await flush()
    }
    this.current = target
    await flush()
  }

  pendingTimers(): number {
    return this.timers.length
  }
}
