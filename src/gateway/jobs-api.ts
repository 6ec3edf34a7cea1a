// src/gateway/jobs-api.ts — Admin and monitoring routes for scheduled jobs
//
// Mounted under /api. Scheduler errors carry a stable code; this router maps
// each code to an HTTP status and never inspects messages.

import { Hono, type Context } from "hono"
import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { SchedulerEngine } from "../cron/engine.js"
import { SchedulerError, errorMessage, type SchedulerErrorCode } from "../cron/errors.js"
import { JobDefinitionInputSchema, JobDefinitionPatchSchema } from "../cron/job-store.js"
import type { RunHistoryLedger } from "../cron/ledger.js"
import type { LedgerEntryKind } from "../cron/types.js"

// ── Dependency interfaces ───────────────────────────────────

export type JobsEngineLike = Pick<
  SchedulerEngine,
  | "createJob"
  | "updateJob"
  | "setEnabled"
  | "deleteJob"
  | "triggerJob"
  | "clearFault"
  | "getJob"
  | "listJobs"
  | "history"
  | "now"
>

export type HistoryLedgerLike = Pick<RunHistoryLedger, "query" | "since" | "prune" | "auditTrail">

export interface JobsApiDeps {
  engine: JobsEngineLike
  ledger: HistoryLedgerLike
}

// ── Request schemas ─────────────────────────────────────────

const PruneRequestSchema = Type.Object({
  olderThanMs: Type.Optional(Type.Integer({ minimum: 0 })),
  olderThanDays: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  actor: Type.Optional(Type.String({ minLength: 1, maxLength: 128 })),
})

const LEDGER_KINDS: ReadonlySet<string> = new Set<LedgerEntryKind>([
  "dispatched",
  "attempt",
  "retry_scheduled",
  "missed_fire",
  "recovered",
])

const MAX_PAGE = 1_000
const DEFAULT_PAGE = 100
const DAY_MS = 86_400_000

type ErrorStatus = 400 | 404 | 409 | 500 | 503

const STATUS_BY_CODE: Record<SchedulerErrorCode, ErrorStatus> = {
  SCHEDULE_INVALID: 400,
  HANDLER_UNKNOWN: 400,
  VALIDATION_ERROR: 400,
  JOB_EXISTS: 409,
  JOB_NOT_FOUND: 404,
  DISPATCH_OVERFLOW: 503,
  EXECUTION_FAILURE: 500,
  EXECUTION_TIMEOUT: 500,
  LEDGER_WRITE_FAILURE: 503,
  STORE_CORRUPT: 500,
}

/** Malformed query string or body; raised inside route handlers only. */
class RequestError extends Error {
  constructor(readonly code: "INVALID_REQUEST" | "VALIDATION_ERROR", message: string) {
    super(message)
    this.name = "RequestError"
  }
}

// ── Router ──────────────────────────────────────────────────

export function createJobsApi(deps: JobsApiDeps): Hono {
  const app = new Hono()
  const { engine, ledger } = deps

  app.onError((err, c) => errorResponse(c, err))

  // ── Jobs ──────────────────────────────────────────────────

  app.post("/jobs", async (c) => {
    const input = await readBody(c, JobDefinitionInputSchema)
    const job = await engine.createJob(input)
    return c.json({ job }, 201)
  })

  app.get("/jobs", (c) => c.json({ jobs: engine.listJobs() }))

  app.get("/jobs/:id", (c) => c.json({ job: engine.getJob(c.req.param("id")) }))

  app.patch("/jobs/:id", async (c) => {
    const patch = await readBody(c, JobDefinitionPatchSchema)
    const job = await engine.updateJob(c.req.param("id"), patch)
    return c.json({ job })
  })

  app.delete("/jobs/:id", async (c) => {
    const id = c.req.param("id")
    await engine.deleteJob(id)
    return c.json({ deleted: true, id })
  })

  app.post("/jobs/:id/disable", async (c) => {
    const job = await engine.setEnabled(c.req.param("id"), false)
    return c.json({ job })
  })

  app.post("/jobs/:id/enable", async (c) => {
    const job = await engine.setEnabled(c.req.param("id"), true)
    return c.json({ job })
  })

  app.post("/jobs/:id/trigger", async (c) => {
    const id = c.req.param("id")
    const result = await engine.triggerJob(id)
    switch (result.status) {
      case "dropped":
        return c.json({ error: `Fire for ${id} dropped (${result.reason})`, code: "FIRE_DROPPED", reason: result.reason }, 409)
      case "rejected":
        return c.json({ error: "Engine is shutting down", code: "ENGINE_STOPPED" }, 503)
      default:
        return c.json({ triggered: true, id, status: result.status }, 202)
    }
  })

  app.post("/jobs/:id/clear-fault", (c) => {
    const id = c.req.param("id")
    return c.json({ id, cleared: engine.clearFault(id) })
  })

  app.get("/jobs/:id/history", (c) => {
    const id = c.req.param("id")
    const attempts = engine.history(id, {
      fromMs: timeParam(c.req.query("from"), "from"),
      toMs: timeParam(c.req.query("to"), "to"),
    })
    return c.json({ jobId: id, attempts })
  })

  // ── History ───────────────────────────────────────────────

  app.get("/history", (c) => {
    const entries = ledger.query({
      jobId: c.req.query("jobId"),
      fromMs: timeParam(c.req.query("from"), "from"),
      toMs: timeParam(c.req.query("to"), "to"),
      kinds: kindsParam(c.req.query("kind")),
      limit: limitParam(c.req.query("limit")),
    })
    return c.json({ entries })
  })

  app.get("/history/export", (c) => {
    const page = ledger.since(c.req.query("cursor") ?? null, limitParam(c.req.query("limit")) ?? DEFAULT_PAGE)
    return c.json(page)
  })

  app.post("/history/prune", async (c) => {
    const body = await readBody(c, PruneRequestSchema)
    const olderThanMs = body.olderThanMs
      ?? (body.olderThanDays !== undefined ? engine.now() - body.olderThanDays * DAY_MS : undefined)
    if (olderThanMs === undefined) {
      throw new RequestError("VALIDATION_ERROR", "olderThanMs or olderThanDays is required")
    }
    const audit = await ledger.prune({ olderThanMs, actor: body.actor ?? "api" })
    return c.json({ audit })
  })

  app.get("/history/prune-audit", async (c) => c.json({ records: await ledger.auditTrail() }))

  return app
}

// ── Helpers ─────────────────────────────────────────────────

async function readBody<S extends TSchema>(c: Context, schema: S): Promise<Static<S>> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    throw new RequestError("INVALID_REQUEST", "Request body must be JSON")
  }
  if (!Value.Check(schema, body)) {
    const first = Value.Errors(schema, body).First()
    throw new RequestError("VALIDATION_ERROR", first ? `${first.path || "/"} ${first.message}` : "Invalid request body")
  }
  return body
}

/** Accepts epoch milliseconds or an ISO 8601 timestamp. */
function timeParam(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw === "") return undefined
  if (/^\d+$/.test(raw)) return Number(raw)
  const parsed = Date.parse(raw)
  if (Number.isNaN(parsed)) {
    throw new RequestError("VALIDATION_ERROR", `${name} must be epoch milliseconds or an ISO 8601 timestamp`)
  }
  return parsed
}

function kindsParam(raw: string | undefined): LedgerEntryKind[] | undefined {
  if (raw === undefined || raw === "") return undefined
  const kinds: LedgerEntryKind[] = []
  for (const kind of raw.split(",")) {
    if (!isLedgerKind(kind)) throw new RequestError("VALIDATION_ERROR", `unknown entry kind "${kind}"`)
    kinds.push(kind)
  }
  return kinds
}

function isLedgerKind(value: string): value is LedgerEntryKind {
  return LEDGER_KINDS.has(value)
}

function limitParam(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === "") return undefined
  const n = parseInt(raw, 10)
  if (isNaN(n) || n < 1) throw new RequestError("VALIDATION_ERROR", "limit must be a positive integer")
  return Math.min(n, MAX_PAGE)
}

function errorResponse(c: Context, err: Error): Response {
  if (err instanceof RequestError) {
    return c.json({ error: err.message, code: err.code }, 400)
  }
  if (err instanceof SchedulerError) {
    const status = STATUS_BY_CODE[err.code]
    if (status >= 500) console.error(`[gateway] ${c.req.method} ${c.req.path}:`, err)
    return c.json({ error: err.message, code: err.code }, status)
  }
  console.error(`[gateway] ${c.req.method} ${c.req.path}: ${errorMessage(err)}`, err)
  return c.json({ error: "Internal server error", code: "INTERNAL_ERROR" }, 500)
}
