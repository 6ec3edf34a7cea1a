// src/cron/engine.ts — SchedulerEngine: trigger loop, admin operations, startup recovery
//
// One explicit engine instance owns the tick loop and the cursor map. All time
// flows through the injected clock, so tests drive the engine without real
// timers.

import { EventEmitter } from "node:events"
import type { AlertServiceLike } from "../alerting/alert-service.js"
import { systemClock, type CancelTimer, type Clock } from "./clock.js"
import {
  ExecutionCoordinator,
  type CoordinatorStats,
  type SubmitResult,
} from "./coordinator.js"
import type { HandlerRegistry } from "./handler-registry.js"
import type { JobDefinitionInput, JobDefinitionPatch, JobDefinitionStore } from "./job-store.js"
import type { RunHistoryLedger } from "./ledger.js"
import { computeNextFireTime } from "./schedule.js"
import { collectDueEvents, type TriggerState } from "./trigger.js"
import type { AttemptEntry, JobDefinition, JobRunState, ScheduledFireEvent } from "./types.js"

// ── Types ───────────────────────────────────────────────────

export interface SchedulerEngineConfig {
  tickIntervalMs?: number          // Default: 1_000
  concurrency?: number             // Default: 4
  queueDepth?: number              // Default: 16
  shutdownTimeoutMs?: number       // Default: 30_000
}

export interface SchedulerEngineDeps {
  store: JobDefinitionStore
  ledger: RunHistoryLedger
  handlers: HandlerRegistry
  clock?: Clock
  alerts?: AlertServiceLike
  random?: () => number
}

/** A definition plus what the engine knows about it right now. */
export interface JobView extends JobDefinition {
  state: JobRunState
  nextFireAtMs: number | null
  lastAttempt: AttemptEntry | null
}

export interface EngineStats extends CoordinatorStats {
  jobs: number
  startedAtMs: number | null
}

const DEFAULT_TICK_MS = 1_000
const DEFAULT_SHUTDOWN_MS = 30_000

// ── SchedulerEngine ─────────────────────────────────────────

/**
 * Emits:
 *   engine:started, engine:stopped, job:created, job:updated, job:deleted,
 *   job:recovered
 *
 * Coordinator events are available on `engine.coordinator`.
 */
export class SchedulerEngine extends EventEmitter {
  readonly coordinator: ExecutionCoordinator
  private readonly store: JobDefinitionStore
  private readonly ledger: RunHistoryLedger
  private readonly clock: Clock
  private readonly config: Required<Omit<SchedulerEngineConfig, "concurrency" | "queueDepth">>

  private cursors = new Map<string, number | null>()
  /** Scheduled time of the latest schedule-sourced fire handed to the coordinator. */
  private readonly lastFired = new Map<string, number>()
  private cancelTick: CancelTimer | null = null
  private running = false
  private startupPending = false
  private startedAtMs: number | null = null

  constructor(deps: SchedulerEngineDeps, config?: SchedulerEngineConfig) {
    super()
    this.store = deps.store
    this.ledger = deps.ledger
    this.clock = deps.clock ?? systemClock
    this.config = {
      tickIntervalMs: config?.tickIntervalMs ?? DEFAULT_TICK_MS,
      shutdownTimeoutMs: config?.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_MS,
    }
    this.coordinator = new ExecutionCoordinator(
      {
        jobs: deps.store,
        handlers: deps.handlers,
        ledger: deps.ledger,
        clock: this.clock,
        alerts: deps.alerts,
        random: deps.random,
      },
      { concurrency: config?.concurrency, queueDepth: config?.queueDepth },
    )
  }

  // ── Lifecycle ───────────────────────────────────────────────

  /**
   * Load definitions and history, close attempts left open by a crash, seed
   * any missing jobs, run the first tick and start the loop.
   */
  async start(seed: readonly JobDefinitionInput[] = []): Promise<void> {
    if (this.running) return
    this.running = true
    this.coordinator.resume()
    this.cursors = new Map()

    await this.store.init()
    await this.ledger.init()
    await this.recoverOpenAttempts()
    await this.seed(seed)

    this.startupPending = true
    this.startedAtMs = this.clock.now()
    console.log(`[cadence] engine started: ${this.store.list().length} job(s), tick ${this.config.tickIntervalMs}ms`)
    this.emit("engine:started", { jobs: this.store.list().length })

    await this.tick()
  }

  /** Stop ticking, cancel pending retries and wait for running attempts. */
  async stop(): Promise<void> {
    if (!this.running) return
    this.running = false

    this.cancelTick?.()
    this.cancelTick = null
    this.coordinator.shutdown()

    let cancelDeadline: CancelTimer = () => {}
    const deadline = new Promise<boolean>((resolve) => {
      cancelDeadline = this.clock.setTimer(() => resolve(false), this.config.shutdownTimeoutMs)
    })
    const drained = await Promise.race([this.coordinator.drain().then(() => true), deadline])
    cancelDeadline()

    if (!drained) {
      console.warn(`[cadence] shutdown deadline (${this.config.shutdownTimeoutMs}ms) passed with ${this.coordinator.stats().running} attempt(s) still running`)
    }
    this.startedAtMs = null
    this.emit("engine:stopped", { drained })
  }

  isRunning(): boolean {
    return this.running
  }

  /** Current time on the engine's clock. */
  now(): number {
    return this.clock.now()
  }

  // ── Trigger loop ────────────────────────────────────────────

  private scheduleTick(): void {
    if (!this.running) return
    this.cancelTick = this.clock.setTimer(() => {
      void this.tick()
    }, this.config.tickIntervalMs)
  }

  /** Evaluate every job once and submit what is due. */
  async tick(): Promise<void> {
    if (!this.running) return
    this.cancelTick = null

    try {
      const now = this.clock.now()
      const jobs = this.store.list()
      const states = new Map<string, TriggerState>()
      for (const job of jobs) {
        states.set(job.id, {
          nextFireAtMs: this.cursors.get(job.id),
          lastRunMs: this.lastRunMs(job.id),
          startup: this.startupPending,
        })
      }

      const { events, cursors } = collectDueEvents(jobs, states, now)
      this.startupPending = false
      this.cursors = cursors

      for (const event of events) {
        await this.submit(event)
      }
    } catch (err) {
      // A bad tick must not stop the loop
      console.error("[cadence] tick error:", err)
    }

    this.scheduleTick()
  }

  private async submit(event: ScheduledFireEvent): Promise<SubmitResult> {
    if (event.source !== "manual") {
      const prev = this.lastFired.get(event.jobId) ?? -Infinity
      this.lastFired.set(event.jobId, Math.max(prev, event.scheduledAtMs))
    }
    return this.coordinator.submit(event)
  }

  private lastRunMs(jobId: string): number | undefined {
    const fromLedger = this.ledger.latestAttempt(jobId)?.scheduledAtMs
    const fired = this.lastFired.get(jobId)
    if (fromLedger === undefined) return fired
    if (fired === undefined) return fromLedger
    return Math.max(fromLedger, fired)
  }

  // ── Administration ──────────────────────────────────────────

  async createJob(input: JobDefinitionInput): Promise<JobDefinition> {
    const job = await this.store.create(input)
    this.cursors.delete(job.id)
    console.log(`[cadence] job created: ${job.id} (${job.schedule.kind} "${job.schedule.expression}")`)
    this.emit("job:created", { jobId: job.id })
    return job
  }

  async updateJob(id: string, patch: JobDefinitionPatch): Promise<JobDefinition> {
    const job = await this.store.update(id, patch)
    this.cursors.delete(id)
    this.emit("job:updated", { jobId: id })
    return job
  }

  /** Takes effect before the next dispatch; a running attempt is not interrupted. */
  async setEnabled(id: string, enabled: boolean): Promise<JobDefinition> {
    const job = await this.store.setEnabled(id, enabled)
    this.cursors.delete(id)
    console.log(`[cadence] job ${enabled ? "enabled" : "disabled"}: ${id}`)
    this.emit("job:updated", { jobId: id })
    return job
  }

  async deleteJob(id: string): Promise<void> {
    await this.store.delete(id)
    this.cursors.delete(id)
    this.lastFired.delete(id)
    console.log(`[cadence] job deleted: ${id}`)
    this.emit("job:deleted", { jobId: id })
  }

  /** Fire a job now, outside its schedule. Disabled jobs are recorded as missed. */
  async triggerJob(id: string): Promise<SubmitResult> {
    this.store.require(id)
    return this.submit({ jobId: id, scheduledAtMs: this.clock.now(), source: "manual" })
  }

  clearFault(id: string): boolean {
    this.store.require(id)
    return this.coordinator.clearFault(id)
  }

  getJob(id: string): JobView {
    return this.view(this.store.require(id))
  }

  listJobs(): JobView[] {
    return this.store.list().map((job) => this.view(job))
  }

  /** Closed attempts for one job, optionally limited to a start-time window. */
  history(id: string, window?: { fromMs?: number; toMs?: number }): AttemptEntry[] {
    this.store.require(id)
    return this.ledger.attempts(id, window)
  }

  stats(): EngineStats {
    return {
      ...this.coordinator.stats(),
      jobs: this.store.list().length,
      startedAtMs: this.startedAtMs,
    }
  }

  // ── Internals ───────────────────────────────────────────────

  private view(job: JobDefinition): JobView {
    const cached = this.cursors.get(job.id)
    const nextFireAtMs = !job.enabled
      ? null
      : cached !== undefined
        ? cached
        : computeNextFireTime(job.schedule, this.lastRunMs(job.id), this.clock.now(), job.createdAt)
    return {
      ...job,
      state: this.coordinator.getJobState(job.id),
      nextFireAtMs,
      lastAttempt: this.ledger.latestAttempt(job.id) ?? null,
    }
  }

  /** Close attempts a previous process dispatched but never recorded an outcome for. */
  private async recoverOpenAttempts(): Promise<void> {
    const open = this.ledger.openDispatches()
    for (const dispatched of open) {
      // still running from before a stop() in this process
      if (this.coordinator.getJobState(dispatched.jobId) !== "idle") continue
      const now = this.clock.now()
      await this.ledger.append({
        kind: "attempt",
        jobId: dispatched.jobId,
        atMs: now,
        runId: dispatched.runId,
        attempt: dispatched.attempt,
        scheduledAtMs: dispatched.scheduledAtMs,
        startedAtMs: dispatched.atMs,
        endedAtMs: now,
        outcome: "timeout",
        error: "interrupted by engine restart",
      })
      await this.ledger.append({
        kind: "recovered",
        jobId: dispatched.jobId,
        atMs: now,
        runId: dispatched.runId,
        attempt: dispatched.attempt,
      })
      console.warn(`[cadence] recovered open attempt ${dispatched.runId} for ${dispatched.jobId}`)
      this.emit("job:recovered", { jobId: dispatched.jobId, runId: dispatched.runId })
    }
  }

  private async seed(inputs: readonly JobDefinitionInput[]): Promise<void> {
    for (const input of inputs) {
      if (this.store.get(input.id)) continue
      await this.store.create(input)
      console.log(`[cadence] seeded job ${input.id}`)
    }
  }
}
