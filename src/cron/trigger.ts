// src/cron/trigger.ts — Trigger evaluation: which jobs are due at a given instant
//
// Pure functions over (definition, cursor, last run, now). The engine owns the
// cursor map and feeds it back in on every tick.

import { computeNextFireTime } from "./schedule.js"
import type { JobDefinition, ScheduledFireEvent } from "./types.js"

export interface TriggerState {
  /** Cached next fire time; undefined means "not yet computed". */
  nextFireAtMs?: number | null
  /** Scheduled time of the most recent recorded attempt for this job. */
  lastRunMs?: number
  /** True on the first evaluation after the engine started. */
  startup: boolean
}

export interface TriggerResult {
  event?: ScheduledFireEvent
  nextFireAtMs: number | null
}

export function evaluateJob(job: JobDefinition, state: TriggerState, nowMs: number): TriggerResult {
  if (!job.enabled) return { nextFireAtMs: null }

  if (state.nextFireAtMs === undefined && state.startup && job.runOnStartup) {
    return {
      event: { jobId: job.id, scheduledAtMs: nowMs, source: "startup" },
      nextFireAtMs: computeNextFireTime(job.schedule, nowMs, nowMs, job.createdAt),
    }
  }

  const next = state.nextFireAtMs !== undefined
    ? state.nextFireAtMs
    : computeNextFireTime(job.schedule, state.lastRunMs, nowMs, job.createdAt)

  if (next === null || next > nowMs) return { nextFireAtMs: next }

  return {
    event: { jobId: job.id, scheduledAtMs: next, source: "schedule" },
    nextFireAtMs: computeNextFireTime(job.schedule, next, nowMs, job.createdAt),
  }
}

export interface DueEvaluation {
  events: ScheduledFireEvent[]
  cursors: Map<string, number | null>
}

/** Evaluate every job once; events come back ordered by scheduled time. */
export function collectDueEvents(
  jobs: readonly JobDefinition[],
  states: ReadonlyMap<string, TriggerState>,
  nowMs: number,
): DueEvaluation {
  const events: ScheduledFireEvent[] = []
  const cursors = new Map<string, number | null>()

  for (const job of jobs) {
    const state = states.get(job.id) ?? { startup: false }
    const result = evaluateJob(job, state, nowMs)
    // Disabled jobs keep no cursor so re-enabling recomputes from history
    if (job.enabled) cursors.set(job.id, result.nextFireAtMs)
    if (result.event) events.push(result.event)
  }

  events.sort((a, b) => a.scheduledAtMs - b.scheduledAtMs)
  return { events, cursors }
}
