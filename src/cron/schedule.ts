// src/cron/schedule.ts — Schedule expression parsing and next-fire computation

import { Cron } from "croner"
import { ScheduleError } from "./errors.js"
import type { JobSchedule } from "./types.js"

// ISO 8601 datetime: starts with 4-digit year, dash, 2-digit month
const ISO_RE = /^\d{4}-\d{2}/

// Interval pattern: digits followed by s/m/h/d
const INTERVAL_RE = /^(\d+)(s|m|h|d)$/

const UNIT_MS: Record<string, number> = {
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
}

/** Parse "30s", "5m", "1h", "2d" into milliseconds. Zero-length intervals are rejected. */
export function parseIntervalMs(expression: string): number {
  const match = INTERVAL_RE.exec(expression)
  if (!match) {
    throw new ScheduleError(expression, "expected <number>(s|m|h|d)")
  }
  const value = parseInt(match[1], 10)
  if (value <= 0) {
    throw new ScheduleError(expression, "interval must be positive")
  }
  return value * UNIT_MS[match[2]]
}

/**
 * Infer the schedule kind from a bare expression:
 * ISO 8601 datetime → "at", interval → "every", anything else → "cron".
 */
export function parseSchedule(input: string): JobSchedule {
  const expression = input.trim()
  if (ISO_RE.test(expression)) return validateSchedule({ kind: "at", expression })
  if (INTERVAL_RE.test(expression)) return validateSchedule({ kind: "every", expression })
  return validateSchedule({ kind: "cron", expression })
}

/** Throws ScheduleError unless the expression is valid for its declared kind. */
export function validateSchedule(schedule: JobSchedule): JobSchedule {
  switch (schedule.kind) {
    case "every":
      parseIntervalMs(schedule.expression)
      return schedule
    case "at":
      if (!ISO_RE.test(schedule.expression) || Number.isNaN(Date.parse(schedule.expression))) {
        throw new ScheduleError(schedule.expression, "expected an ISO 8601 timestamp")
      }
      return schedule
    case "cron":
      try {
        new Cron(schedule.expression)
      } catch (err) {
        throw new ScheduleError(schedule.expression, err instanceof Error ? err.message : String(err))
      }
      return schedule
  }
}

/**
 * Next fire time for a schedule, never earlier than nowMs.
 *
 * The anchor is the last run's scheduled time, or the job's creation time
 * when it has never run. A last run stamped in the future (clock skew) pushes
 * the anchor forward, so one occurrence cannot fire twice. Returns null when
 * the schedule will not fire again.
 */
export function computeNextFireTime(
  schedule: JobSchedule,
  lastRunMs: number | undefined,
  nowMs: number,
  createdAtMs: number,
): number | null {
  const anchor = lastRunMs ?? createdAtMs

  switch (schedule.kind) {
    case "every": {
      const intervalMs = parseIntervalMs(schedule.expression)
      const first = anchor + intervalMs
      if (first >= nowMs) return first
      const steps = Math.ceil((nowMs - first) / intervalMs)
      return first + steps * intervalMs
    }

    case "cron": {
      // croner returns the first match strictly after its start date
      const from = anchor >= nowMs ? anchor : nowMs - 1
      const next = new Cron(schedule.expression).nextRun(new Date(from))
      return next ? next.getTime() : null
    }

    case "at": {
      const targetMs = Date.parse(schedule.expression)
      if (lastRunMs !== undefined && lastRunMs >= targetMs) return null
      return targetMs >= nowMs ? targetMs : null
    }
  }
}
