// tests/helpers/fixtures.ts — Job definitions and gates shared by scheduler tests

import type { JobDefinition } from "../../src/cron/types.js"

export function makeJob(overrides: Partial<JobDefinition> = {}): JobDefinition {
  const id = overrides.id ?? "job-a"
  return {
    id,
    name: id,
    schedule: { kind: "every", expression: "1m" },
    handlerId: "test",
    retry: { maxAttempts: 1, baseDelayMs: 1_000, maxDelayMs: 30_000, jitter: false },
    timeoutMs: 5_000,
    overlapPolicy: "skip",
    maxQueuedFires: 1,
    runOnStartup: false,
    enabled: true,
    params: {},
    createdAt: 0,
    updatedAt: 0,
    ...overrides,
  }
}

export interface Gate {
  promise: Promise<void>
  open(): void
}

/** A promise the test resolves by hand, to hold a handler mid-run. */
export function gate(): Gate {
  let open: () => void = () => {}
  const promise = new Promise<void>((resolve) => {
    open = resolve
  })
  return { promise, open }
}
