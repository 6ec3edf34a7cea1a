// src/cron/ledger-backend.ts — Storage backends for the run history ledger
//
// JsonlLedgerBackend keeps one append-only JSONL file per job, the same
// layout the run log has always used: `{runsDir}/{jobId}.jsonl`.

import { mkdir, open, readdir, readFile, rename, type FileHandle } from "node:fs/promises"
import { dirname, join } from "node:path"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { LedgerEntry, PruneAuditRecord } from "./types.js"

export interface LedgerBackend {
  /** Every persisted entry, in no particular order, at most once per seq. */
  load(): Promise<LedgerEntry[]>
  /**
   * Resolves only once the entry is durable. May be called again with the same
   * entry after a failure that came after the write.
   */
  append(entry: LedgerEntry): Promise<void>
  /** Replace a job's history wholesale. Only retention pruning calls this. */
  rewrite(jobId: string, entries: LedgerEntry[]): Promise<void>
  appendAudit(record: PruneAuditRecord): Promise<void>
  loadAudit(): Promise<PruneAuditRecord[]>
}

// ── Entry schema (used to validate lines read back from disk) ──

const Base = {
  seq: Type.String(),
  jobId: Type.String(),
  atMs: Type.Number(),
}

export const LedgerEntrySchema = Type.Union([
  Type.Object({
    ...Base,
    kind: Type.Literal("dispatched"),
    runId: Type.String(),
    attempt: Type.Integer(),
    scheduledAtMs: Type.Number(),
  }),
  Type.Object({
    ...Base,
    kind: Type.Literal("attempt"),
    runId: Type.String(),
    attempt: Type.Integer(),
    scheduledAtMs: Type.Number(),
    startedAtMs: Type.Number(),
    endedAtMs: Type.Number(),
    outcome: Type.Union([Type.Literal("success"), Type.Literal("failure"), Type.Literal("timeout")]),
    error: Type.Optional(Type.String()),
  }),
  Type.Object({
    ...Base,
    kind: Type.Literal("retry_scheduled"),
    runId: Type.String(),
    attempt: Type.Integer(),
    retryAtMs: Type.Number(),
    delayMs: Type.Number(),
  }),
  Type.Object({
    ...Base,
    kind: Type.Literal("missed_fire"),
    scheduledAtMs: Type.Number(),
    reason: Type.Union([
      Type.Literal("queue_full"),
      Type.Literal("overlap"),
      Type.Literal("overlap_cap"),
      Type.Literal("duplicate"),
      Type.Literal("disabled"),
    ]),
  }),
  Type.Object({
    ...Base,
    kind: Type.Literal("recovered"),
    runId: Type.String(),
    attempt: Type.Integer(),
  }),
])

const PruneAuditSchema = Type.Object({
  seq: Type.String(),
  actor: Type.String(),
  olderThanMs: Type.Number(),
  prunedAtMs: Type.Number(),
  removed: Type.Integer(),
  jobs: Type.Array(Type.String()),
})

// ── JSONL backend ───────────────────────────────────────────

export class JsonlLedgerBackend implements LedgerBackend {
  private readonly auditPath: string

  constructor(private readonly runsDir: string, auditPath?: string) {
    this.auditPath = auditPath ?? join(runsDir, "_audit", "prune.jsonl")
  }

  async load(): Promise<LedgerEntry[]> {
    let files: string[]
    try {
      files = await readdir(this.runsDir)
    } catch (err: unknown) {
      if (isEnoent(err)) return []
      throw err
    }

    const entries: LedgerEntry[] = []
    const seen = new Set<string>()
    for (const file of files) {
      if (!file.endsWith(".jsonl")) continue
      const raw = await readFile(join(this.runsDir, file), "utf-8")
      for (const line of parseLines(raw, file)) {
        if (Value.Check(LedgerEntrySchema, line)) {
          // a retried append can leave the same entry twice
          if (seen.has(line.seq)) continue
          seen.add(line.seq)
          entries.push(line)
        } else {
          console.warn(`[ledger] skipping malformed entry in ${file}`)
        }
      }
    }
    return entries
  }

  async append(entry: LedgerEntry): Promise<void> {
    await appendLineDurably(this.jobPath(entry.jobId), JSON.stringify(entry))
  }

  async rewrite(jobId: string, entries: LedgerEntry[]): Promise<void> {
    const path = this.jobPath(jobId)
    const tmp = `${path}.tmp`
    const body = entries.map((e) => JSON.stringify(e) + "\n").join("")
    const fh = await open(tmp, "w")
    try {
      await fh.writeFile(body, "utf-8")
      await fh.sync()
    } finally {
      await fh.close()
    }
    await rename(tmp, path)
  }

  async appendAudit(record: PruneAuditRecord): Promise<void> {
    await appendLineDurably(this.auditPath, JSON.stringify(record))
  }

  async loadAudit(): Promise<PruneAuditRecord[]> {
    let raw: string
    try {
      raw = await readFile(this.auditPath, "utf-8")
    } catch (err: unknown) {
      if (isEnoent(err)) return []
      throw err
    }
    return parseLines(raw, this.auditPath).filter(
      (line): line is Static<typeof PruneAuditSchema> => Value.Check(PruneAuditSchema, line),
    )
  }

  private jobPath(jobId: string): string {
    return join(this.runsDir, `${jobId}.jsonl`)
  }
}

// ── In-memory backend ───────────────────────────────────────

/** Process-local backend for tests and embedded use. Nothing survives a restart. */
export class InMemoryLedgerBackend implements LedgerBackend {
  private readonly byJob = new Map<string, LedgerEntry[]>()
  private readonly audit: PruneAuditRecord[] = []

  constructor(seed: LedgerEntry[] = []) {
    for (const entry of seed) this.push(entry)
  }

  async load(): Promise<LedgerEntry[]> {
    return [...this.byJob.values()].flat()
  }

  async append(entry: LedgerEntry): Promise<void> {
    const list = this.byJob.get(entry.jobId)
    if (list?.some((e) => e.seq === entry.seq)) return
    this.push(entry)
  }

  async rewrite(jobId: string, entries: LedgerEntry[]): Promise<void> {
    this.byJob.set(jobId, [...entries])
  }

  async appendAudit(record: PruneAuditRecord): Promise<void> {
    this.audit.push(record)
  }

  async loadAudit(): Promise<PruneAuditRecord[]> {
    return [...this.audit]
  }

  private push(entry: LedgerEntry): void {
    const list = this.byJob.get(entry.jobId)
    if (list) list.push(entry)
    else this.byJob.set(entry.jobId, [entry])
  }
}

// ── Helpers ─────────────────────────────────────────────────

/**
 * Append one line and fsync. A fragment left by an earlier failed append is
 * closed off with a newline first, so it is dropped on load on its own.
 */
async function appendLineDurably(path: string, line: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const fh = await open(path, "a+")
  try {
    const { size } = await fh.stat()
    const prefix = size > 0 && !(await endsWithNewline(fh, size)) ? "\n" : ""
    await fh.writeFile(prefix + line + "\n", "utf-8")
    await fh.sync()
  } finally {
    await fh.close()
  }
}

async function endsWithNewline(fh: FileHandle, size: number): Promise<boolean> {
  const last = Buffer.alloc(1)
  await fh.read(last, 0, 1, size - 1)
  return last[0] === 0x0a
}

/** Parse JSONL, dropping a torn trailing line left by a crash mid-append. */
function parseLines(raw: string, source: string): unknown[] {
  const out: unknown[] = []
  for (const line of raw.split("\n")) {
    if (line.trim() === "") continue
    try {
      out.push(JSON.parse(line))
    } catch {
      console.warn(`[ledger] unparseable line in ${source}`)
    }
  }
  return out
}

function isEnoent(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
