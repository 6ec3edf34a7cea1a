// src/cron/errors.ts — Scheduler error taxonomy
//
// Every error carries a stable `code` so the admin API can map it to a
// status without string matching on messages.

export type SchedulerErrorCode =
  | "SCHEDULE_INVALID"
  | "DISPATCH_OVERFLOW"
  | "EXECUTION_FAILURE"
  | "EXECUTION_TIMEOUT"
  | "LEDGER_WRITE_FAILURE"
  | "JOB_NOT_FOUND"
  | "JOB_EXISTS"
  | "HANDLER_UNKNOWN"
  | "STORE_CORRUPT"
  | "VALIDATION_ERROR"

export abstract class SchedulerError extends Error {
  abstract readonly code: SchedulerErrorCode
}

/** Malformed schedule expression; rejected when the job is created or updated. */
export class ScheduleError extends SchedulerError {
  readonly code = "SCHEDULE_INVALID"
  constructor(expression: string, reason: string) {
    super(`Invalid schedule "${expression}": ${reason}`)
    this.name = "ScheduleError"
  }
}

/** Dispatch queue depth exceeded. Recorded as a missed fire, never thrown past the coordinator. */
export class DispatchOverflow extends SchedulerError {
  readonly code = "DISPATCH_OVERFLOW"
  constructor(jobId: string, queueDepth: number) {
    super(`Dispatch queue full (depth ${queueDepth}); fire for ${jobId} dropped`)
    this.name = "DispatchOverflow"
  }
}

export class ExecutionFailure extends SchedulerError {
  readonly code = "EXECUTION_FAILURE"
  constructor(jobId: string, attempt: number, detail: string) {
    super(`Job ${jobId} attempt ${attempt} failed: ${detail}`)
    this.name = "ExecutionFailure"
  }
}

export class ExecutionTimeout extends SchedulerError {
  readonly code = "EXECUTION_TIMEOUT"
  constructor(jobId: string, attempt: number, timeoutMs: number) {
    super(`Job ${jobId} attempt ${attempt} exceeded ${timeoutMs}ms`)
    this.name = "ExecutionTimeout"
  }
}

export class LedgerWriteFailure extends SchedulerError {
  readonly code = "LEDGER_WRITE_FAILURE"
  constructor(jobId: string, attempts: number, cause: unknown) {
    super(`Ledger append for ${jobId} failed after ${attempts} attempt(s): ${errorMessage(cause)}`, { cause })
    this.name = "LedgerWriteFailure"
  }
}

export class JobNotFoundError extends SchedulerError {
  readonly code = "JOB_NOT_FOUND"
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`)
    this.name = "JobNotFoundError"
  }
}

export class JobExistsError extends SchedulerError {
  readonly code = "JOB_EXISTS"
  constructor(jobId: string) {
    super(`Job already exists: ${jobId}`)
    this.name = "JobExistsError"
  }
}

export class UnknownHandlerError extends SchedulerError {
  readonly code = "HANDLER_UNKNOWN"
  constructor(handlerId: string) {
    super(`No handler registered under "${handlerId}"`)
    this.name = "UnknownHandlerError"
  }
}

/** A definition that parses but breaks a field constraint (negative timeout, ...). */
export class InvalidJobError extends SchedulerError {
  readonly code = "VALIDATION_ERROR"
  constructor(jobId: string, detail: string) {
    super(`Invalid job definition ${jobId}: ${detail}`)
    this.name = "InvalidJobError"
  }
}

/** Thrown when the primary, backup and tmp store files all fail validation. */
export class StoreCorruptionError extends SchedulerError {
  readonly code = "STORE_CORRUPT"
  constructor(filePath: string, reason: string) {
    super(`Store corruption: ${filePath} (${reason})`)
    this.name = "StoreCorruptionError"
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
