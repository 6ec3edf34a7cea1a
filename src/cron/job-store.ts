// src/cron/job-store.ts — Durable job definition store
//
// The only owner of JobDefinition records. Administrative calls mutate it;
// the engine and coordinator only read.

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { systemClock, type Clock } from "./clock.js"
import { InvalidJobError, JobExistsError, JobNotFoundError } from "./errors.js"
import type { HandlerRegistry } from "./handler-registry.js"
import { DEFAULT_RETRY_POLICY, RetryPolicySchema } from "./retry-policy.js"
import { parseSchedule, validateSchedule } from "./schedule.js"
import { AsyncMutex } from "./mutex.js"
import { AtomicJsonStore } from "./store.js"
import type { JobDefinition, JobSchedule, RetryPolicy } from "./types.js"

// ── Schemas ─────────────────────────────────────────────────

/** Ids double as ledger file names, so keep them path-safe. */
export const JOB_ID_PATTERN = "^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$"

const ScheduleSchema = Type.Object({
  kind: Type.Union([Type.Literal("cron"), Type.Literal("every"), Type.Literal("at")]),
  expression: Type.String({ minLength: 1 }),
})

const OverlapPolicySchema = Type.Union([Type.Literal("skip"), Type.Literal("queue")])

export const JobDefinitionSchema = Type.Object({
  id: Type.String({ pattern: JOB_ID_PATTERN }),
  name: Type.String(),
  schedule: ScheduleSchema,
  handlerId: Type.String({ minLength: 1 }),
  retry: RetryPolicySchema,
  timeoutMs: Type.Integer({ minimum: 1 }),
  overlapPolicy: OverlapPolicySchema,
  maxQueuedFires: Type.Integer({ minimum: 0 }),
  runOnStartup: Type.Boolean(),
  enabled: Type.Boolean(),
  params: Type.Record(Type.String(), Type.Unknown()),
  createdAt: Type.Number(),
  updatedAt: Type.Number(),
})

/** Accepted by create(): a bare schedule string or an explicit {kind, expression}. */
export const JobDefinitionInputSchema = Type.Object({
  id: Type.String({ pattern: JOB_ID_PATTERN }),
  name: Type.Optional(Type.String()),
  schedule: Type.Union([Type.String({ minLength: 1 }), ScheduleSchema]),
  handlerId: Type.String({ minLength: 1 }),
  retry: Type.Optional(Type.Partial(RetryPolicySchema)),
  timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
  overlapPolicy: Type.Optional(OverlapPolicySchema),
  maxQueuedFires: Type.Optional(Type.Integer({ minimum: 0 })),
  runOnStartup: Type.Optional(Type.Boolean()),
  enabled: Type.Optional(Type.Boolean()),
  params: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
})

export const JobDefinitionPatchSchema = Type.Partial(Type.Omit(JobDefinitionInputSchema, ["id"]))

const JobStoreFileSchema = Type.Object({
  version: Type.Literal(1),
  jobs: Type.Array(JobDefinitionSchema),
})

export type JobDefinitionInput = Static<typeof JobDefinitionInputSchema>
export type JobDefinitionPatch = Static<typeof JobDefinitionPatchSchema>

export interface JobDefaults {
  timeoutMs: number
  retry: RetryPolicy
  maxQueuedFires: number
}

const FALLBACK_DEFAULTS: JobDefaults = {
  timeoutMs: 5 * 60_000,
  retry: DEFAULT_RETRY_POLICY,
  maxQueuedFires: 1,
}

export interface JobDefinitionStoreOptions {
  handlers: HandlerRegistry
  clock?: Clock
  defaults?: Partial<JobDefaults>
}

// ── Store ───────────────────────────────────────────────────

export class JobDefinitionStore {
  private readonly file: AtomicJsonStore<typeof JobStoreFileSchema>
  private readonly handlers: HandlerRegistry
  private readonly clock: Clock
  private readonly defaults: JobDefaults
  private readonly mutex = new AsyncMutex()
  private jobs: JobDefinition[] = []

  constructor(filePath: string, opts: JobDefinitionStoreOptions) {
    this.file = new AtomicJsonStore(filePath, JobStoreFileSchema)
    this.handlers = opts.handlers
    this.clock = opts.clock ?? systemClock
    this.defaults = { ...FALLBACK_DEFAULTS, ...opts.defaults }
  }

  async init(): Promise<void> {
    const loaded = await this.file.read()
    this.jobs = loaded ? loaded.jobs : []
    for (const job of this.jobs) {
      if (!this.handlers.has(job.handlerId)) {
        console.warn(`[job-store] job ${job.id} references unregistered handler "${job.handlerId}"`)
      }
    }
  }

  list(): readonly JobDefinition[] {
    return this.jobs
  }

  get(id: string): JobDefinition | undefined {
    return this.jobs.find((j) => j.id === id)
  }

  require(id: string): JobDefinition {
    const job = this.get(id)
    if (!job) throw new JobNotFoundError(id)
    return job
  }

  /**
   * Validate and persist a new definition. Throws ScheduleError,
   * UnknownHandlerError or JobExistsError before anything is written.
   */
  async create(input: JobDefinitionInput): Promise<JobDefinition> {
    return this.mutex.runExclusive(async () => {
      if (this.get(input.id)) throw new JobExistsError(input.id)

      const schedule = toSchedule(input.schedule)
      this.handlers.resolve(input.handlerId)

      const now = this.clock.now()
      const job: JobDefinition = {
        id: input.id,
        name: input.name ?? input.id,
        schedule,
        handlerId: input.handlerId,
        retry: { ...this.defaults.retry, ...input.retry },
        timeoutMs: input.timeoutMs ?? this.defaults.timeoutMs,
        overlapPolicy: input.overlapPolicy ?? "skip",
        maxQueuedFires: input.maxQueuedFires ?? this.defaults.maxQueuedFires,
        runOnStartup: input.runOnStartup ?? false,
        enabled: input.enabled ?? true,
        params: input.params ?? {},
        createdAt: now,
        updatedAt: now,
      }
      assertValid(job)

      await this.commit([...this.jobs, job])
      return job
    })
  }

  async update(id: string, patch: JobDefinitionPatch): Promise<JobDefinition> {
    return this.mutex.runExclusive(async () => {
      const current = this.require(id)

      const schedule = patch.schedule !== undefined ? toSchedule(patch.schedule) : current.schedule
      if (patch.handlerId !== undefined) this.handlers.resolve(patch.handlerId)

      const next: JobDefinition = {
        ...current,
        name: patch.name ?? current.name,
        schedule,
        handlerId: patch.handlerId ?? current.handlerId,
        retry: { ...current.retry, ...patch.retry },
        timeoutMs: patch.timeoutMs ?? current.timeoutMs,
        overlapPolicy: patch.overlapPolicy ?? current.overlapPolicy,
        maxQueuedFires: patch.maxQueuedFires ?? current.maxQueuedFires,
        runOnStartup: patch.runOnStartup ?? current.runOnStartup,
        enabled: patch.enabled ?? current.enabled,
        params: patch.params ?? current.params,
        updatedAt: this.clock.now(),
      }
      assertValid(next)

      await this.commit(this.jobs.map((j) => (j.id === id ? next : j)))
      return next
    })
  }

  async setEnabled(id: string, enabled: boolean): Promise<JobDefinition> {
    return this.update(id, { enabled })
  }

  async delete(id: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.require(id)
      await this.commit(this.jobs.filter((j) => j.id !== id))
    })
  }

  /** In-memory state only changes once the file write succeeded. */
  private async commit(jobs: JobDefinition[]): Promise<void> {
    await this.file.write({ version: 1, jobs })
    this.jobs = jobs
  }
}

function toSchedule(input: string | JobSchedule): JobSchedule {
  return typeof input === "string" ? parseSchedule(input) : validateSchedule(input)
}

function assertValid(job: JobDefinition): void {
  if (!Value.Check(JobDefinitionSchema, job)) {
    const first = Value.Errors(JobDefinitionSchema, job).First()
    throw new InvalidJobError(job.id, first ? `${first.path} ${first.message}` : "schema mismatch")
  }
}
