// tests/cadence/ledger.test.ts — Run history ledger: appends, reads, export, retention

import { appendFile, mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { LedgerWriteFailure } from "../../src/cron/errors.js"
import { RunHistoryLedger } from "../../src/cron/ledger.js"
import { InMemoryLedgerBackend, JsonlLedgerBackend } from "../../src/cron/ledger-backend.js"
import type { LedgerEntry, LedgerEntryInput } from "../../src/cron/types.js"
import { ManualClock } from "../helpers/manual-clock.js"

const T0 = 1_700_000_000_000

function attempt(jobId: string, atMs: number, runId = `run-${jobId}-${atMs}`): LedgerEntryInput {
  return {
    kind: "attempt",
    jobId,
    atMs,
    runId,
    attempt: 1,
    scheduledAtMs: atMs,
    startedAtMs: atMs,
    endedAtMs: atMs,
    outcome: "success",
  }
}

function missed(jobId: string, atMs: number): LedgerEntryInput {
  return { kind: "missed_fire", jobId, atMs, scheduledAtMs: atMs, reason: "overlap" }
}

/** Fails the first `failures` appends, then behaves. */
class FlakyBackend extends InMemoryLedgerBackend {
  constructor(private failures: number) {
    super()
  }

  override async append(entry: LedgerEntry): Promise<void> {
    if (this.failures > 0) {
      this.failures--
      throw new Error("disk full")
    }
    await super.append(entry)
  }
}

/** Writes the line, then reports a failure once, as an fsync or close error would. */
class WriteThenFailBackend extends JsonlLedgerBackend {
  private failed = false

  override async append(entry: LedgerEntry): Promise<void> {
    await super.append(entry)
    if (!this.failed) {
      this.failed = true
      throw new Error("fsync failed")
    }
  }
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {})
  vi.spyOn(console, "warn").mockImplementation(() => {})
})

describe("RunHistoryLedger", () => {
  let clock: ManualClock
  let ledger: RunHistoryLedger

  beforeEach(async () => {
    clock = new ManualClock(T0)
    ledger = new RunHistoryLedger(new InMemoryLedgerBackend(), { clock })
    await ledger.init()
  })

  // ── Appends ─────────────────────────────────────────────────

  it("assigns strictly increasing sequence ids", async () => {
    const a = await ledger.append(missed("a", T0))
    const b = await ledger.append(missed("a", T0))
    expect(b.seq > a.seq).toBe(true)
  })

  it("retries a failed write before succeeding", async () => {
    ledger = new RunHistoryLedger(new FlakyBackend(2), { clock, writeAttempts: 3 })
    await ledger.append(attempt("a", T0))
    expect(ledger.attempts("a")).toHaveLength(1)
  })

  it("throws LedgerWriteFailure once retries are exhausted and keeps the entry out", async () => {
    ledger = new RunHistoryLedger(new FlakyBackend(3), { clock, writeAttempts: 3 })

    const err = await ledger.append(attempt("a", T0)).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(LedgerWriteFailure)
    expect(err).toHaveProperty("message", "Ledger append for a failed after 3 attempt(s): disk full")
    expect(ledger.query()).toEqual([])
  })

  // ── Reads ───────────────────────────────────────────────────

  it("returns the latest attempt and attempts in a window", async () => {
    await ledger.append(attempt("a", T0))
    await ledger.append(missed("a", T0 + 500))
    await ledger.append(attempt("a", T0 + 1_000))
    await ledger.append(attempt("a", T0 + 2_000))

    expect(ledger.latestAttempt("a")?.startedAtMs).toBe(T0 + 2_000)
    expect(ledger.attempts("a", { fromMs: T0 + 1_000, toMs: T0 + 2_000 }).map((e) => e.startedAtMs)).toEqual([T0 + 1_000])
    expect(ledger.latestAttempt("missing")).toBeUndefined()
  })

  it("filters by job, kind and limit", async () => {
    await ledger.append(attempt("a", T0))
    await ledger.append(missed("b", T0 + 1))
    await ledger.append(attempt("b", T0 + 2))

    expect(ledger.query({ jobId: "b" }).map((e) => e.kind)).toEqual(["missed_fire", "attempt"])
    expect(ledger.query({ kinds: ["attempt"] }).map((e) => e.jobId)).toEqual(["a", "b"])
    expect(ledger.query({ limit: 1 }).map((e) => e.jobId)).toEqual(["a"])
  })

  it("lists dispatches that were never closed", async () => {
    await ledger.append({ kind: "dispatched", jobId: "a", atMs: T0, runId: "r1", attempt: 1, scheduledAtMs: T0 })
    await ledger.append({ kind: "dispatched", jobId: "a", atMs: T0, runId: "r2", attempt: 1, scheduledAtMs: T0 })
    await ledger.append(attempt("a", T0, "r1"))

    expect(ledger.openDispatches().map((e) => e.runId)).toEqual(["r2"])
  })

  // ── Export ──────────────────────────────────────────────────

  it("pages through history with a cursor", async () => {
    const written: LedgerEntry[] = []
    for (let i = 0; i < 5; i++) written.push(await ledger.append(missed("a", T0 + i)))

    const first = ledger.since(null, 2)
    expect(first).toEqual({ entries: written.slice(0, 2), cursor: written[1].seq })

    const second = ledger.since(first.cursor, 2)
    expect(second).toEqual({ entries: written.slice(2, 4), cursor: written[3].seq })

    const third = ledger.since(second.cursor, 2)
    expect(third).toEqual({ entries: written.slice(4), cursor: written[4].seq })

    expect(ledger.since(third.cursor, 2)).toEqual({ entries: [], cursor: written[4].seq })
  })

  it("pushes appended entries to subscribers until they unsubscribe", async () => {
    const seen: string[] = []
    const unsubscribe = ledger.subscribe((e) => seen.push(e.jobId))

    await ledger.append(missed("a", T0))
    unsubscribe()
    await ledger.append(missed("b", T0))

    expect(seen).toEqual(["a"])
  })

  it("keeps appending when a subscriber throws", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    ledger.subscribe(() => { throw new Error("boom") })

    await ledger.append(missed("a", T0))

    expect(ledger.query()).toHaveLength(1)
    expect(error).toHaveBeenCalledTimes(1)
  })

  // ── Retention ───────────────────────────────────────────────

  it("prunes old entries but keeps each job's latest attempt", async () => {
    await ledger.append(attempt("a", T0 - 3_000))
    await ledger.append(attempt("a", T0 - 2_000))
    await ledger.append(missed("a", T0 - 1_000))
    await ledger.append(attempt("b", T0 + 1_000))

    const audit = await ledger.prune({ olderThanMs: T0, actor: "ops" })

    expect(audit).toMatchObject({ actor: "ops", olderThanMs: T0, prunedAtMs: T0, removed: 2, jobs: ["a"] })
    expect(ledger.query({ jobId: "a" }).map((e) => e.atMs)).toEqual([T0 - 2_000])
    expect(ledger.query().map((e) => e.jobId)).toEqual(["a", "b"])
    expect(await ledger.auditTrail()).toEqual([audit])
  })

  it("records an audit entry even when nothing was removed", async () => {
    await ledger.append(attempt("a", T0))

    const audit = await ledger.prune({ olderThanMs: T0, actor: "api" })

    expect(audit).toMatchObject({ removed: 0, jobs: [] })
    expect(await ledger.auditTrail()).toHaveLength(1)
  })
})

describe("JsonlLedgerBackend", () => {
  let dir: string
  let clock: ManualClock

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cadence-ledger-"))
    clock = new ManualClock(T0)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  function open(): RunHistoryLedger {
    return new RunHistoryLedger(new JsonlLedgerBackend(join(dir, "runs"), join(dir, "prune-audit.jsonl")), { clock })
  }

  it("writes one file per job and reloads entries in order", async () => {
    const ledger = open()
    await ledger.init()
    await ledger.append(attempt("a", T0))
    await ledger.append(missed("b", T0 + 1))
    await ledger.append(attempt("a", T0 + 2))

    const lines = (await readFile(join(dir, "runs", "a.jsonl"), "utf-8")).trim().split("\n")
    expect(lines.map((l) => JSON.parse(l).atMs)).toEqual([T0, T0 + 2])

    const reopened = open()
    await reopened.init()
    expect(reopened.query()).toEqual(ledger.query())
  })

  it("loads an empty history when the runs directory does not exist", async () => {
    const ledger = open()
    await ledger.init()
    expect(ledger.query()).toEqual([])
    expect(await ledger.auditTrail()).toEqual([])
  })

  it("skips torn and malformed lines", async () => {
    const ledger = open()
    await ledger.init()
    const good = await ledger.append(attempt("a", T0))

    const path = join(dir, "runs", "a.jsonl")
    const raw = await readFile(path, "utf-8")
    await writeFile(path, raw + JSON.stringify({ kind: "attempt", jobId: "a" }) + "\n" + '{"kind":"att', "utf-8")

    const reopened = open()
    await reopened.init()
    expect(reopened.query()).toEqual([good])
  })

  it("keeps one copy of an entry whose append failed after writing", async () => {
    const runsDir = join(dir, "runs")
    const ledger = new RunHistoryLedger(new WriteThenFailBackend(runsDir), { clock })
    await ledger.init()

    const entry = await ledger.append(attempt("a", T0))

    const lines = (await readFile(join(runsDir, "a.jsonl"), "utf-8")).trim().split("\n")
    expect(lines).toEqual([JSON.stringify(entry), JSON.stringify(entry)])
    expect(ledger.query()).toEqual([entry])

    const reopened = open()
    await reopened.init()
    expect(reopened.query()).toEqual([entry])
  })

  it("starts a new line after a fragment left by a failed append", async () => {
    const ledger = open()
    await ledger.init()
    const first = await ledger.append(attempt("a", T0))
    await appendFile(join(dir, "runs", "a.jsonl"), '{"kind":"att', "utf-8")
    const second = await ledger.append(attempt("a", T0 + 1))

    const reopened = open()
    await reopened.init()
    expect(reopened.query()).toEqual([first, second])
  })

  it("persists pruning and its audit record", async () => {
    const ledger = open()
    await ledger.init()
    await ledger.append(attempt("a", T0 - 2_000))
    await ledger.append(attempt("a", T0 - 1_000))

    const audit = await ledger.prune({ olderThanMs: T0, actor: "ops" })

    const reopened = open()
    await reopened.init()
    expect(reopened.query().map((e) => e.atMs)).toEqual([T0 - 1_000])
    expect(await reopened.auditTrail()).toEqual([audit])
  })
})
