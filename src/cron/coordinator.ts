// src/cron/coordinator.ts — Execution coordinator: worker slots, dispatch queue, per-job lock, retries
//
// A job's "cycle" starts when a fire event is admitted and ends when the
// attempt chain succeeds or stops. While a cycle is active the job id is
// locked: no second attempt can open, and further fire events follow the
// job's overlap policy. All state transitions below happen synchronously
// before the first await, so concurrent submits cannot both take the lock.

import { EventEmitter } from "node:events"
import { monotonicFactory } from "ulid"
import type { AlertServiceLike } from "../alerting/alert-service.js"
import { systemClock, type CancelTimer, type Clock } from "./clock.js"
import {
  DispatchOverflow,
  ExecutionFailure,
  ExecutionTimeout,
  JobNotFoundError,
  LedgerWriteFailure,
  errorMessage,
} from "./errors.js"
import type { HandlerRegistry } from "./handler-registry.js"
import type { RunHistoryLedger } from "./ledger.js"
import { decideRetry } from "./retry-policy.js"
import { runWithTimeout, type BoundedResult } from "./timeout.js"
import type {
  AttemptEntry,
  JobDefinition,
  JobRunState,
  LedgerEntry,
  LedgerEntryInput,
  MissedFireReason,
  ScheduledFireEvent,
} from "./types.js"

// ── Types ───────────────────────────────────────────────────

/** Read-only view of the definition store. */
export interface JobLookup {
  get(id: string): JobDefinition | undefined
}

export interface CoordinatorConfig {
  /** Worker slots. Default 4. */
  concurrency?: number
  /** Global FIFO depth for events waiting on a slot. Default 16. */
  queueDepth?: number
}

export interface CoordinatorDeps {
  jobs: JobLookup
  handlers: HandlerRegistry
  ledger: RunHistoryLedger
  clock?: Clock
  alerts?: AlertServiceLike
  /** Jitter source for backoff. Default Math.random. */
  random?: () => number
}

export type SubmitResult =
  | { status: "dispatched" | "queued" | "backlogged" }
  | { status: "dropped"; reason: MissedFireReason }
  | { status: "rejected"; reason: "stopped" }

export type CycleResult = "succeeded" | "stopped"

export interface CoordinatorStats {
  concurrency: number
  queueDepth: number
  running: number
  queued: number
  activeJobs: number
  faultedJobs: string[]
}

interface Cycle {
  event: ScheduledFireEvent
  key: string
  state: Exclude<JobRunState, "idle">
  attempt: number
  cancelRetry?: CancelTimer
}

const DEFAULT_CONCURRENCY = 4
const DEFAULT_QUEUE_DEPTH = 16

// ── ExecutionCoordinator ────────────────────────────────────

/**
 * Emits:
 *   fire:dispatched, fire:queued, fire:backlogged, fire:missed,
 *   attempt:completed, attempt:failed, retry:scheduled, cycle:completed,
 *   job:faulted
 */
export class ExecutionCoordinator extends EventEmitter {
  private readonly jobs: JobLookup
  private readonly handlers: HandlerRegistry
  private readonly ledger: RunHistoryLedger
  private readonly clock: Clock
  private readonly alerts?: AlertServiceLike
  private readonly random: () => number
  private readonly concurrency: number
  private readonly queueDepth: number
  private readonly nextRunId = monotonicFactory()

  private readonly cycles = new Map<string, Cycle>()
  private readonly backlog = new Map<string, ScheduledFireEvent[]>()
  private readonly queue: string[] = []
  private readonly inflight = new Set<Promise<void>>()
  private running = 0
  private stopped = false

  constructor(deps: CoordinatorDeps, config?: CoordinatorConfig) {
    super()
    this.jobs = deps.jobs
    this.handlers = deps.handlers
    this.ledger = deps.ledger
    this.clock = deps.clock ?? systemClock
    this.alerts = deps.alerts
    this.random = deps.random ?? Math.random
    this.concurrency = Math.max(1, config?.concurrency ?? DEFAULT_CONCURRENCY)
    this.queueDepth = Math.max(0, config?.queueDepth ?? DEFAULT_QUEUE_DEPTH)
  }

  // ── Public API ──────────────────────────────────────────────

  /**
   * Admit one fire event. Resolves once the resulting ledger entry (missed
   * fire, if any) is written; the attempt itself runs in the background.
   */
  async submit(event: ScheduledFireEvent): Promise<SubmitResult> {
    const { result, pending } = this.admit(event)
    await pending
    return result
  }

  getJobState(jobId: string): JobRunState {
    return this.cycles.get(jobId)?.state ?? "idle"
  }

  /** Current attempt number of an active cycle, or 0 when idle. */
  getAttempt(jobId: string): number {
    return this.cycles.get(jobId)?.attempt ?? 0
  }

  stats(): CoordinatorStats {
    return {
      concurrency: this.concurrency,
      queueDepth: this.queueDepth,
      running: this.running,
      queued: this.queue.length,
      activeJobs: this.cycles.size,
      faultedJobs: [...this.cycles.entries()]
        .filter(([, c]) => c.state === "faulted")
        .map(([id]) => id),
    }
  }

  /** Release a job held after its attempt could not be recorded. */
  clearFault(jobId: string): boolean {
    const cycle = this.cycles.get(jobId)
    if (!cycle || cycle.state !== "faulted") return false
    console.log(`[coordinator] fault cleared for ${jobId} by operator`)
    this.finishCycle(jobId, "stopped")
    return true
  }

  /** Wait for every running attempt and pending ledger write to settle. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight])
    }
  }

  /**
   * Stop admitting events: cancel pending retries and drop queued work.
   * Running attempts are left to finish; await drain() for them.
   */
  shutdown(): void {
    this.stopped = true
    this.queue.length = 0
    this.backlog.clear()
    for (const [jobId, cycle] of this.cycles) {
      cycle.cancelRetry?.()
      if (cycle.state === "queued" || cycle.state === "retry_scheduled") {
        this.cycles.delete(jobId)
      }
    }
  }

  /** Admit events again after shutdown(). */
  resume(): void {
    this.stopped = false
  }

  // ── Admission ───────────────────────────────────────────────

  private admit(event: ScheduledFireEvent): { result: SubmitResult; pending: Promise<void> } {
    if (this.stopped) {
      return { result: { status: "rejected", reason: "stopped" }, pending: Promise.resolve() }
    }

    const job = this.jobs.get(event.jobId)
    if (!job) throw new JobNotFoundError(event.jobId)
    if (!job.enabled) return this.miss(event, "disabled")

    const key = fireKey(event)
    const active = this.cycles.get(job.id)
    if (active) {
      const waiting = this.backlog.get(job.id) ?? []
      if (active.key === key || waiting.some((e) => fireKey(e) === key)) {
        return this.miss(event, "duplicate")
      }
      if (job.overlapPolicy === "queue") {
        if (waiting.length < job.maxQueuedFires) {
          this.backlog.set(job.id, [...waiting, event])
          this.publish("fire:backlogged", { jobId: job.id, scheduledAtMs: event.scheduledAtMs, depth: waiting.length + 1 })
          return { result: { status: "backlogged" }, pending: Promise.resolve() }
        }
        return this.miss(event, "overlap_cap")
      }
      return this.miss(event, "overlap")
    }

    const cycle: Cycle = { event, key, state: "queued", attempt: 1 }

    if (this.running < this.concurrency) {
      this.cycles.set(job.id, cycle)
      this.dispatch(cycle, job)
      return { result: { status: "dispatched" }, pending: Promise.resolve() }
    }

    if (this.queue.length < this.queueDepth) {
      this.cycles.set(job.id, cycle)
      this.queue.push(job.id)
      this.publish("fire:queued", { jobId: job.id, scheduledAtMs: event.scheduledAtMs, position: this.queue.length })
      return { result: { status: "queued" }, pending: Promise.resolve() }
    }

    return this.miss(event, "queue_full")
  }

  private miss(
    event: ScheduledFireEvent,
    reason: MissedFireReason,
  ): { result: SubmitResult; pending: Promise<void> } {
    const error = reason === "queue_full" ? new DispatchOverflow(event.jobId, this.queueDepth) : undefined
    console.warn(`[coordinator] missed fire ${event.jobId}@${new Date(event.scheduledAtMs).toISOString()} (${reason})`)
    this.publish("fire:missed", { jobId: event.jobId, scheduledAtMs: event.scheduledAtMs, reason, error })

    const pending = this.record({
      kind: "missed_fire",
      jobId: event.jobId,
      atMs: this.clock.now(),
      scheduledAtMs: event.scheduledAtMs,
      reason,
    }).then(() => undefined, (err: unknown) => this.raiseLedgerAlert(event.jobId, err))

    return { result: { status: "dropped", reason }, pending: this.track(pending) }
  }

  // ── Dispatch ────────────────────────────────────────────────

  /** Take a slot and start the attempt. Caller guarantees a free slot. */
  private dispatch(cycle: Cycle, job: JobDefinition): void {
    this.running++
    cycle.state = "dispatched"
    cycle.cancelRetry = undefined
    const runId = this.nextRunId(this.clock.now())
    this.publish("fire:dispatched", { jobId: job.id, runId, attempt: cycle.attempt })
    this.track(this.runAttempt(cycle, job, runId))
  }

  private async runAttempt(cycle: Cycle, job: JobDefinition, runId: string): Promise<void> {
    const jobId = job.id
    const scheduledAtMs = cycle.event.scheduledAtMs
    const attempt = cycle.attempt

    try {
      await this.record({ kind: "dispatched", jobId, atMs: this.clock.now(), runId, attempt, scheduledAtMs })
    } catch (err) {
      this.running--
      await this.fault(jobId, err)
      this.pump()
      return
    }
    // startedAtMs and the deadline share one origin
    const startedAtMs = this.clock.now()

    let result: BoundedResult
    try {
      const handler = this.handlers.resolve(job.handlerId)
      result = await runWithTimeout(
        handler,
        { jobId, attempt, scheduledAtMs, params: job.params },
        { clock: this.clock, timeoutMs: job.timeoutMs, startedAtMs },
      )
    } catch (err) {
      result = { outcome: "failure", error: errorMessage(err), endedAtMs: this.clock.now() }
    }

    const closed: Omit<AttemptEntry, "seq"> = {
      kind: "attempt",
      jobId,
      atMs: result.endedAtMs,
      runId,
      attempt,
      scheduledAtMs,
      startedAtMs,
      endedAtMs: result.endedAtMs,
      outcome: result.outcome,
      ...(result.error !== undefined ? { error: result.error } : {}),
    }

    let entry: AttemptEntry
    try {
      const { seq } = await this.record(closed)
      entry = { ...closed, seq }
    } catch (err) {
      // The slot is free but the job stays locked until an operator clears it
      this.running--
      await this.fault(jobId, err)
      this.pump()
      return
    }

    this.publish("attempt:completed", entry)
    if (result.outcome !== "success") {
      const error = result.outcome === "timeout"
        ? new ExecutionTimeout(jobId, attempt, job.timeoutMs)
        : new ExecutionFailure(jobId, attempt, result.error ?? "unknown error")
      console.warn(`[coordinator] ${error.message}`)
      this.publish("attempt:failed", { entry, error })
    }

    // Re-read: the job may have been disabled or deleted while running
    const current = this.jobs.get(jobId)
    const decision = decideRetry({
      attempt,
      outcome: result.outcome,
      policy: current?.retry ?? job.retry,
      jobEnabled: current?.enabled ?? false,
      nowMs: this.clock.now(),
      random: this.random,
    })

    this.running--

    if (decision.kind === "stop") {
      if (decision.reason === "max_attempts" && this.alerts) {
        const alert = this.alerts.fire("error", "retries_exhausted", {
          jobId,
          runId,
          message: `Job ${jobId} gave up after ${attempt} attempt(s): ${result.error ?? result.outcome}`,
          details: { scheduledAtMs, outcome: result.outcome },
        })
        this.track(alert.then(() => undefined))
      }
      this.finishCycle(jobId, result.outcome === "success" ? "succeeded" : "stopped")
      this.pump()
      return
    }

    cycle.state = "retry_scheduled"
    cycle.attempt = decision.attempt
    this.pump()

    try {
      await this.record({
        kind: "retry_scheduled",
        jobId,
        atMs: this.clock.now(),
        runId,
        attempt: decision.attempt,
        retryAtMs: decision.atMs,
        delayMs: decision.delayMs,
      })
    } catch (err) {
      await this.fault(jobId, err)
      return
    }

    if (this.cycles.get(jobId) !== cycle || this.stopped) return
    console.log(`[coordinator] ${jobId} retry ${decision.attempt} in ${Math.round(decision.delayMs)}ms`)
    this.publish("retry:scheduled", { jobId, attempt: decision.attempt, retryAtMs: decision.atMs, delayMs: decision.delayMs })
    cycle.cancelRetry = this.clock.setTimer(() => this.resumeRetry(jobId, cycle), decision.delayMs)
  }

  /** Re-enter a retry into the slot/queue pipeline, keeping its attempt number. */
  private resumeRetry(jobId: string, cycle: Cycle): void {
    if (this.cycles.get(jobId) !== cycle || cycle.state !== "retry_scheduled") return
    cycle.cancelRetry = undefined

    const job = this.jobs.get(jobId)
    if (!job || !job.enabled) {
      console.log(`[coordinator] ${jobId} disabled before retry ${cycle.attempt}; stopping`)
      this.finishCycle(jobId, "stopped")
      return
    }

    if (this.running < this.concurrency) {
      this.dispatch(cycle, job)
      return
    }
    if (this.queue.length < this.queueDepth) {
      cycle.state = "queued"
      this.queue.push(jobId)
      this.publish("fire:queued", { jobId, scheduledAtMs: cycle.event.scheduledAtMs, position: this.queue.length })
      return
    }

    this.finishCycle(jobId, "stopped")
    this.track(this.miss(cycle.event, "queue_full").pending)
  }

  /** Fill free slots from the FIFO queue. */
  private pump(): void {
    while (this.running < this.concurrency && this.queue.length > 0) {
      const jobId = this.queue.shift()
      if (jobId === undefined) break
      const cycle = this.cycles.get(jobId)
      if (!cycle || cycle.state !== "queued") continue

      const job = this.jobs.get(jobId)
      if (!job || !job.enabled) {
        this.finishCycle(jobId, "stopped")
        this.track(this.miss(cycle.event, "disabled").pending)
        continue
      }
      this.dispatch(cycle, job)
    }
  }

  private finishCycle(jobId: string, result: CycleResult): void {
    const cycle = this.cycles.get(jobId)
    if (!cycle) return
    cycle.cancelRetry?.()
    this.cycles.delete(jobId)
    this.publish("cycle:completed", { jobId, result, attempts: cycle.attempt, scheduledAtMs: cycle.event.scheduledAtMs })

    const waiting = this.backlog.get(jobId)
    const next = waiting?.shift()
    if (waiting && waiting.length === 0) this.backlog.delete(jobId)
    if (next && !this.stopped && this.jobs.get(jobId)) {
      this.track(this.admit(next).pending)
    }
  }

  // ── Ledger & faults ─────────────────────────────────────────

  private record(input: LedgerEntryInput): Promise<LedgerEntry> {
    return this.ledger.append(input)
  }

  private async fault(jobId: string, err: unknown): Promise<void> {
    const cycle = this.cycles.get(jobId)
    if (cycle) {
      cycle.cancelRetry?.()
      cycle.state = "faulted"
    }
    this.publish("job:faulted", { jobId, error: err })
    await this.raiseLedgerAlert(jobId, err)
  }

  private async raiseLedgerAlert(jobId: string, err: unknown): Promise<void> {
    const message = err instanceof LedgerWriteFailure ? err.message : `Ledger write failed for ${jobId}: ${errorMessage(err)}`
    console.error(`[coordinator] ${message}`)
    if (this.alerts) {
      await this.alerts.fire("critical", "ledger_write_failure", { jobId, message })
    }
  }

  /** Emit to listeners; a throwing listener is logged and does not reach the caller. */
  private publish(event: string, payload: unknown): void {
    try {
      this.emit(event, payload)
    } catch (err) {
      console.error(`[coordinator] ${event} listener threw:`, err)
    }
  }

  private track(promise: Promise<void>): Promise<void> {
    const tracked = promise.catch((err: unknown) => {
      console.error("[coordinator] background task failed:", err)
    })
    this.inflight.add(tracked)
    void tracked.finally(() => this.inflight.delete(tracked))
    return tracked
  }
}

function fireKey(event: ScheduledFireEvent): string {
  return `${event.jobId}@${event.scheduledAtMs}`
}
