// src/cron/clock.ts — Injectable time source for the engine and coordinator

/** Cancels a pending timer. Calling it after the timer fired is a no-op. */
export type CancelTimer = () => void

export interface Clock {
  now(): number
  /** Run fn after delayMs. Timers must not keep the process alive. */
  setTimer(fn: () => void, delayMs: number): CancelTimer
}

export const systemClock: Clock = {
  now: () => Date.now(),
  setTimer(fn, delayMs) {
    const timer = setTimeout(fn, Math.max(0, delayMs))
    timer.unref()
    return () => clearTimeout(timer)
  },
}
