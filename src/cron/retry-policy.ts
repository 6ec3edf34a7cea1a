// src/cron/retry-policy.ts — Bounded exponential backoff as a pure decision function

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { AttemptOutcome, RetryDecision, RetryPolicy } from "./types.js"

export const RetryPolicySchema = Type.Object({
  maxAttempts: Type.Integer({ minimum: 1 }),
  baseDelayMs: Type.Number({ minimum: 0 }),
  maxDelayMs: Type.Number({ minimum: 0 }),
  jitter: Type.Boolean(),
})

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  jitter: true,
}

export const JITTER_MIN = 0.5
export const JITTER_MAX = 1.5

export interface RetryInput {
  attempt: number
  outcome: AttemptOutcome
  policy: RetryPolicy
  /** Whether the job is still enabled at decision time. */
  jobEnabled: boolean
  nowMs: number
  /** Uniform source in [0, 1). Defaults to Math.random. */
  random?: () => number
}

/**
 * delay = min(baseDelayMs * 2^(attempt-1) * jitterFactor, maxDelayMs), with
 * jitterFactor uniform in [0.5, 1.5] when jitter is on.
 */
export function computeBackoffMs(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const factor = policy.jitter ? JITTER_MIN + random() * (JITTER_MAX - JITTER_MIN) : 1
  const raw = policy.baseDelayMs * 2 ** (attempt - 1) * factor
  return Math.min(raw, policy.maxDelayMs)
}

/**
 * Decide whether a closed attempt is retried. Anything unexpected (malformed
 * policy, bad attempt number, non-finite delay) yields "stop".
 */
export function decideRetry(input: RetryInput): RetryDecision {
  try {
    if (input.outcome === "success") return { kind: "stop", reason: "success" }
    if (!Value.Check(RetryPolicySchema, input.policy)) return { kind: "stop", reason: "invalid_policy" }
    if (!Number.isInteger(input.attempt) || input.attempt < 1) return { kind: "stop", reason: "invalid_policy" }
    if (!input.jobEnabled) return { kind: "stop", reason: "disabled" }
    if (input.attempt >= input.policy.maxAttempts) return { kind: "stop", reason: "max_attempts" }

    const delayMs = computeBackoffMs(input.attempt, input.policy, input.random)
    if (!Number.isFinite(delayMs) || delayMs < 0) return { kind: "stop", reason: "invalid_policy" }

    return {
      kind: "retry",
      atMs: input.nowMs + delayMs,
      attempt: input.attempt + 1,
      delayMs,
    }
  } catch (err) {
    console.warn("[retry-policy] decision failed, stopping:", err)
    return { kind: "stop", reason: "invalid_policy" }
  }
}
