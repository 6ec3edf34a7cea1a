// src/cron/ledger.ts — Append-only run history ledger
//
// Every coordinator transition lands here. Appends are serialized through one
// mutex, so per-job order on disk matches the order the coordinator produced
// it, and an entry is visible to readers only after the backend confirmed it.

import { monotonicFactory } from "ulid"
import { systemClock, type Clock } from "./clock.js"
import { LedgerWriteFailure } from "./errors.js"
import type { LedgerBackend } from "./ledger-backend.js"
import { AsyncMutex } from "./mutex.js"
import type {
  AttemptEntry,
  LedgerEntry,
  LedgerEntryInput,
  LedgerEntryKind,
  PruneAuditRecord,
} from "./types.js"

export type LedgerListener = (entry: LedgerEntry) => void

export interface LedgerQuery {
  jobId?: string
  /** Inclusive lower bound on entry time. */
  fromMs?: number
  /** Exclusive upper bound on entry time. */
  toMs?: number
  kinds?: LedgerEntryKind[]
  limit?: number
}

export interface ExportPage {
  entries: LedgerEntry[]
  /** Pass back as `cursor` to continue; null when nothing was returned. */
  cursor: string | null
}

export interface RunHistoryLedgerOptions {
  clock?: Clock
  /** Total tries per append before LedgerWriteFailure. Default 3. */
  writeAttempts?: number
}

const DEFAULT_WRITE_ATTEMPTS = 3
const DEFAULT_EXPORT_LIMIT = 100

export class RunHistoryLedger {
  private readonly backend: LedgerBackend
  private readonly clock: Clock
  private readonly writeAttempts: number
  private readonly mutex = new AsyncMutex()
  private readonly nextSeq = monotonicFactory()
  private readonly listeners = new Set<LedgerListener>()

  private entries: LedgerEntry[] = []
  private byJob = new Map<string, LedgerEntry[]>()

  constructor(backend: LedgerBackend, opts?: RunHistoryLedgerOptions) {
    this.backend = backend
    this.clock = opts?.clock ?? systemClock
    this.writeAttempts = Math.max(1, opts?.writeAttempts ?? DEFAULT_WRITE_ATTEMPTS)
  }

  /** Load persisted history into the in-memory index. */
  async init(): Promise<void> {
    const loaded = await this.backend.load()
    loaded.sort((a, b) => (a.seq < b.seq ? -1 : a.seq > b.seq ? 1 : 0))
    this.entries = []
    this.byJob = new Map()
    for (const entry of loaded) this.index(entry)
  }

  // ── Writes ──────────────────────────────────────────────────

  /**
   * Durably append one entry. Retries the backend write up to writeAttempts
   * times, then throws LedgerWriteFailure; the entry is not indexed unless the
   * write succeeded.
   */
  async append(input: LedgerEntryInput): Promise<LedgerEntry> {
    return this.mutex.runExclusive(async () => {
      const entry: LedgerEntry = { ...input, seq: this.nextSeq(this.clock.now()) }

      let lastError: unknown
      for (let attempt = 1; attempt <= this.writeAttempts; attempt++) {
        try {
          await this.backend.append(entry)
          this.index(entry)
          this.notify(entry)
          return entry
        } catch (err) {
          lastError = err
          console.warn(`[ledger] append failed for ${entry.jobId} (try ${attempt}/${this.writeAttempts}):`, err)
        }
      }
      throw new LedgerWriteFailure(entry.jobId, this.writeAttempts, lastError)
    })
  }

  /**
   * Retention: drop entries older than olderThanMs. The latest attempt of each
   * job is always kept so trigger evaluation still has its anchor. Writes an
   * audit record of what was removed.
   */
  async prune(opts: { olderThanMs: number; actor: string }): Promise<PruneAuditRecord> {
    return this.mutex.runExclusive(async () => {
      let removed = 0
      const touched: string[] = []

      for (const [jobId, list] of this.byJob) {
        const keepLatest = findLast(list, isAttempt)
        const kept = list.filter((e) => e.atMs >= opts.olderThanMs || e === keepLatest)
        if (kept.length === list.length) continue

        await this.backend.rewrite(jobId, kept)
        removed += list.length - kept.length
        touched.push(jobId)
        this.byJob.set(jobId, kept)
      }

      if (removed > 0) {
        const live = new Set([...this.byJob.values()].flat())
        this.entries = this.entries.filter((e) => live.has(e))
      }

      const record: PruneAuditRecord = {
        seq: this.nextSeq(this.clock.now()),
        actor: opts.actor,
        olderThanMs: opts.olderThanMs,
        prunedAtMs: this.clock.now(),
        removed,
        jobs: touched.sort(),
      }
      await this.backend.appendAudit(record)
      console.log(`[ledger] pruned ${removed} entries older than ${new Date(opts.olderThanMs).toISOString()} (actor=${opts.actor})`)
      return record
    })
  }

  // ── Reads ───────────────────────────────────────────────────

  /** Most recent closed attempt for a job. */
  latestAttempt(jobId: string): AttemptEntry | undefined {
    return findLast(this.byJob.get(jobId) ?? [], isAttempt)
  }

  /** Closed attempts for a job in start order, optionally within a time window. */
  attempts(jobId: string, window?: { fromMs?: number; toMs?: number }): AttemptEntry[] {
    return (this.byJob.get(jobId) ?? [])
      .filter(isAttempt)
      .filter((e) => inWindow(e.startedAtMs, window?.fromMs, window?.toMs))
  }

  query(q: LedgerQuery = {}): LedgerEntry[] {
    const source = q.jobId !== undefined ? (this.byJob.get(q.jobId) ?? []) : this.entries
    const kinds = q.kinds ? new Set(q.kinds) : null
    const matched = source.filter(
      (e) => (!kinds || kinds.has(e.kind)) && inWindow(e.atMs, q.fromMs, q.toMs),
    )
    return q.limit !== undefined ? matched.slice(0, q.limit) : matched
  }

  /** Pull export: entries strictly after cursor, oldest first. */
  since(cursor?: string | null, limit = DEFAULT_EXPORT_LIMIT): ExportPage {
    const start = cursor ? this.entries.findIndex((e) => e.seq > cursor) : 0
    if (start === -1) return { entries: [], cursor: cursor ?? null }
    const page = this.entries.slice(start, start + limit)
    return { entries: page, cursor: page.length > 0 ? page[page.length - 1].seq : (cursor ?? null) }
  }

  /** Dispatched entries with no closing attempt or recovery entry (crash leftovers). */
  openDispatches(): Extract<LedgerEntry, { kind: "dispatched" }>[] {
    const closed = new Set<string>()
    for (const e of this.entries) {
      if (e.kind === "attempt" || e.kind === "recovered") closed.add(e.runId)
    }
    return this.entries.filter(
      (e): e is Extract<LedgerEntry, { kind: "dispatched" }> => e.kind === "dispatched" && !closed.has(e.runId),
    )
  }

  async auditTrail(): Promise<PruneAuditRecord[]> {
    return this.backend.loadAudit()
  }

  /** Push export: listener sees every entry appended after subscribing. */
  subscribe(listener: LedgerListener): () => void {
    this.listeners.add(listener)
    return () => { this.listeners.delete(listener) }
  }

  // ── Internals ───────────────────────────────────────────────

  private index(entry: LedgerEntry): void {
    this.entries.push(entry)
    const list = this.byJob.get(entry.jobId)
    if (list) list.push(entry)
    else this.byJob.set(entry.jobId, [entry])
  }

  private notify(entry: LedgerEntry): void {
    for (const listener of this.listeners) {
      try {
        listener(entry)
      } catch (err) {
        console.error("[ledger] export listener threw:", err)
      }
    }
  }
}

function isAttempt(e: LedgerEntry): e is AttemptEntry {
  return e.kind === "attempt"
}

function findLast<T, S extends T>(list: readonly T[], pred: (item: T) => item is S): S | undefined {
  for (let i = list.length - 1; i >= 0; i--) {
    const item = list[i]
    if (pred(item)) return item
  }
  return undefined
}

function inWindow(atMs: number, fromMs?: number, toMs?: number): boolean {
  if (fromMs !== undefined && atMs < fromMs) return false
  if (toMs !== undefined && atMs >= toMs) return false
  return true
}
