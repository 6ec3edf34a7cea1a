// src/cron/types.ts — Job definition, fire event, attempt and ledger types

export interface JobSchedule {
  kind: "cron" | "every" | "at"
  expression: string
}

/** What happens to a fire event for a job whose cycle is still active. */
export type OverlapPolicy = "skip" | "queue"

export interface RetryPolicy {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  jitter: boolean
}

export interface JobDefinition {
  id: string
  name: string
  schedule: JobSchedule
  handlerId: string
  retry: RetryPolicy
  timeoutMs: number
  overlapPolicy: OverlapPolicy
  /** Per-job backlog cap when overlapPolicy is "queue". */
  maxQueuedFires: number
  runOnStartup: boolean
  enabled: boolean
  params: Record<string, unknown>
  createdAt: number
  updatedAt: number
}

export type FireSource = "schedule" | "manual" | "startup"

export interface ScheduledFireEvent {
  jobId: string
  scheduledAtMs: number
  source: FireSource
}

export type AttemptOutcome = "success" | "failure" | "timeout"

export interface ExecutionAttempt {
  runId: string
  jobId: string
  attempt: number
  scheduledAtMs: number
  startedAtMs: number
  endedAtMs: number
  outcome: AttemptOutcome
  error?: string
}

export type RetryDecision =
  | { kind: "stop"; reason: "success" | "max_attempts" | "disabled" | "invalid_policy" }
  | { kind: "retry"; atMs: number; attempt: number; delayMs: number }

export type MissedFireReason = "queue_full" | "overlap" | "overlap_cap" | "duplicate" | "disabled"

/** Per-job position in the dispatch state machine. */
export type JobRunState = "idle" | "queued" | "dispatched" | "retry_scheduled" | "faulted"

// ── Ledger entries ──────────────────────────────────────────

interface LedgerEntryBase {
  /** ULID, monotonic within a process; doubles as the export cursor. */
  seq: string
  jobId: string
  atMs: number
}

export interface DispatchedEntry extends LedgerEntryBase {
  kind: "dispatched"
  runId: string
  attempt: number
  scheduledAtMs: number
}

export interface AttemptEntry extends LedgerEntryBase, Omit<ExecutionAttempt, "jobId"> {
  kind: "attempt"
}

export interface RetryScheduledEntry extends LedgerEntryBase {
  kind: "retry_scheduled"
  runId: string
  attempt: number
  retryAtMs: number
  delayMs: number
}

export interface MissedFireEntry extends LedgerEntryBase {
  kind: "missed_fire"
  scheduledAtMs: number
  reason: MissedFireReason
}

export interface RecoveredEntry extends LedgerEntryBase {
  kind: "recovered"
  runId: string
  attempt: number
}

export type LedgerEntry =
  | DispatchedEntry
  | AttemptEntry
  | RetryScheduledEntry
  | MissedFireEntry
  | RecoveredEntry

export type LedgerEntryKind = LedgerEntry["kind"]

/** Distributive Omit so each union member keeps its own fields. */
export type LedgerEntryInput = LedgerEntry extends infer E
  ? E extends LedgerEntry ? Omit<E, "seq"> : never
  : never

export interface PruneAuditRecord {
  seq: string
  actor: string
  olderThanMs: number
  prunedAtMs: number
  removed: number
  jobs: string[]
}
