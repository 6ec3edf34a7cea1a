// tests/gateway/jobs-api.test.ts — Admin API routes, auth, CORS and error mapping

import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { SchedulerEngine } from "../../src/cron/engine.js"
import { HandlerRegistry } from "../../src/cron/handler-registry.js"
import { JobDefinitionStore } from "../../src/cron/job-store.js"
import { RunHistoryLedger } from "../../src/cron/ledger.js"
import { InMemoryLedgerBackend } from "../../src/cron/ledger-backend.js"
import { createApp } from "../../src/gateway/server.js"
import { ManualClock, flush } from "../helpers/manual-clock.js"

const T0 = 1_700_000_000_000
const TOKEN = "test-secret"
const DAY = 86_400_000

describe("jobs API", () => {
  let dir: string
  let clock: ManualClock
  let engine: SchedulerEngine
  let ledger: RunHistoryLedger
  let app: ReturnType<typeof createApp>

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "warn").mockImplementation(() => {})
    dir = await mkdtemp(join(tmpdir(), "cadence-api-"))
    clock = new ManualClock(T0)
    const handlers = new HandlerRegistry().register("copy", async () => {})
    const store = new JobDefinitionStore(join(dir, "jobs.json"), { handlers, clock })
    ledger = new RunHistoryLedger(new InMemoryLedgerBackend(), { clock })
    engine = new SchedulerEngine({ store, ledger, handlers, clock }, { concurrency: 2, queueDepth: 4 })
    await engine.start()
    app = createApp({ auth: { bearerToken: TOKEN, corsOrigins: ["localhost:*"] } }, { engine, ledger })
  })

  afterEach(async () => {
    await engine.stop()
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  async function call(method: string, path: string, body?: unknown): Promise<Response> {
    return app.request(path, {
      method,
      headers: { Authorization: `Bearer ${TOKEN}`, "Content-Type": "application/json" },
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
    })
  }

  async function createOrders(): Promise<void> {
    const res = await call("POST", "/api/jobs", { id: "orders", schedule: "5m", handlerId: "copy" })
    expect(res.status).toBe(201)
  }

  // ── Health, auth, CORS ──────────────────────────────────────

  it("serves health without auth", async () => {
    const res = await app.request("/health")
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      status: "healthy",
      engine: { jobs: 0, running: 0, concurrency: 2, queueDepth: 4, startedAtMs: T0 },
    })
  })

  it("reports a stopped engine as unhealthy", async () => {
    await engine.stop()
    const res = await app.request("/health")
    expect(res.status).toBe(503)
    expect(await res.json()).toMatchObject({ status: "stopped" })
  })

  it("requires the bearer token on /api", async () => {
    const missing = await app.request("/api/jobs")
    expect(missing.status).toBe(401)
    expect(await missing.json()).toEqual({ error: "Unauthorized", code: "AUTH_REQUIRED" })

    const wrong = await app.request("/api/jobs", { headers: { Authorization: "Bearer wrong" } })
    expect(wrong.status).toBe(401)
    expect(await wrong.json()).toEqual({ error: "Unauthorized", code: "AUTH_INVALID" })
  })

  it("answers preflight requests from allowed origins", async () => {
    const res = await app.request("/api/jobs", { method: "OPTIONS", headers: { Origin: "http://localhost:5173" } })
    expect(res.status).toBe(204)
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("http://localhost:5173")

    const denied = await app.request("/api/jobs", { method: "OPTIONS", headers: { Origin: "https://evil.example.com" } })
    expect(denied.headers.get("Access-Control-Allow-Origin")).toBeNull()
  })

  it("returns 404 for unknown routes", async () => {
    const res = await call("GET", "/api/nothing-here")
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: "Not found", code: "ROUTE_NOT_FOUND" })
  })

  // ── Job administration ──────────────────────────────────────

  it("creates, reads, updates and deletes a job", async () => {
    await createOrders()

    const got = await call("GET", "/api/jobs/orders")
    expect(got.status).toBe(200)
    expect(await got.json()).toMatchObject({
      job: {
        id: "orders",
        schedule: { kind: "every", expression: "5m" },
        state: "idle",
        nextFireAtMs: T0 + 5 * 60_000,
        lastAttempt: null,
      },
    })

    const patched = await call("PATCH", "/api/jobs/orders", { timeoutMs: 1_000 })
    expect(await patched.json()).toMatchObject({ job: { id: "orders", timeoutMs: 1_000 } })

    const listed = await call("GET", "/api/jobs")
    expect(await listed.json()).toMatchObject({ jobs: [{ id: "orders", timeoutMs: 1_000 }] })

    const deleted = await call("DELETE", "/api/jobs/orders")
    expect(await deleted.json()).toEqual({ deleted: true, id: "orders" })
    expect((await call("GET", "/api/jobs/orders")).status).toBe(404)
  })

  it("maps scheduler errors to statuses", async () => {
    await createOrders()

    const duplicate = await call("POST", "/api/jobs", { id: "orders", schedule: "5m", handlerId: "copy" })
    expect(duplicate.status).toBe(409)
    expect(await duplicate.json()).toEqual({ error: "Job already exists: orders", code: "JOB_EXISTS" })

    const badSchedule = await call("POST", "/api/jobs", { id: "b", schedule: "0s", handlerId: "copy" })
    expect(badSchedule.status).toBe(400)
    expect(await badSchedule.json()).toEqual({ error: 'Invalid schedule "0s": interval must be positive', code: "SCHEDULE_INVALID" })

    const badHandler = await call("POST", "/api/jobs", { id: "c", schedule: "5m", handlerId: "nope" })
    expect(badHandler.status).toBe(400)
    expect(await badHandler.json()).toEqual({ error: 'No handler registered under "nope"', code: "HANDLER_UNKNOWN" })

    const missing = await call("GET", "/api/jobs/ghost")
    expect(missing.status).toBe(404)
    expect(await missing.json()).toEqual({ error: "Job not found: ghost", code: "JOB_NOT_FOUND" })
  })

  it("validates request bodies", async () => {
    const notJson = await call("POST", "/api/jobs", "{ nope")
    expect(notJson.status).toBe(400)
    expect(await notJson.json()).toEqual({ error: "Request body must be JSON", code: "INVALID_REQUEST" })

    const incomplete = await call("POST", "/api/jobs", { id: "orders", schedule: "5m" })
    expect(incomplete.status).toBe(400)
    const body = await incomplete.json()
    expect(body).toMatchObject({ code: "VALIDATION_ERROR" })
    expect(body.error).toMatch(/^\/handlerId /)
  })

  // ── Triggering ──────────────────────────────────────────────

  it("triggers a job and exposes its history", async () => {
    await createOrders()

    const res = await call("POST", "/api/jobs/orders/trigger")
    expect(res.status).toBe(202)
    expect(await res.json()).toEqual({ triggered: true, id: "orders", status: "dispatched" })
    await flush()

    const history = await call("GET", "/api/jobs/orders/history")
    expect(await history.json()).toMatchObject({ jobId: "orders", attempts: [{ outcome: "success", scheduledAtMs: T0 }] })

    const entries = await call("GET", "/api/history?jobId=orders&kind=dispatched,attempt")
    const { entries: list } = await entries.json()
    expect(list.map((e: { kind: string }) => e.kind)).toEqual(["dispatched", "attempt"])
  })

  it("refuses to trigger a disabled job", async () => {
    await createOrders()
    const disabled = await call("POST", "/api/jobs/orders/disable")
    expect(await disabled.json()).toMatchObject({ job: { enabled: false } })

    const res = await call("POST", "/api/jobs/orders/trigger")
    expect(res.status).toBe(409)
    expect(await res.json()).toEqual({ error: "Fire for orders dropped (disabled)", code: "FIRE_DROPPED", reason: "disabled" })

    const enabled = await call("POST", "/api/jobs/orders/enable")
    expect(await enabled.json()).toMatchObject({ job: { enabled: true } })
  })

  it("reports a stopping engine on trigger", async () => {
    await createOrders()
    await engine.stop()

    const res = await call("POST", "/api/jobs/orders/trigger")
    expect(res.status).toBe(503)
    expect(await res.json()).toEqual({ error: "Engine is shutting down", code: "ENGINE_STOPPED" })
  })

  it("clears faults only on faulted jobs", async () => {
    await createOrders()
    const res = await call("POST", "/api/jobs/orders/clear-fault")
    expect(await res.json()).toEqual({ id: "orders", cleared: false })
  })

  // ── History ─────────────────────────────────────────────────

  it("rejects malformed history filters", async () => {
    await createOrders()

    const kind = await call("GET", "/api/history?kind=bogus")
    expect(kind.status).toBe(400)
    expect(await kind.json()).toEqual({ error: 'unknown entry kind "bogus"', code: "VALIDATION_ERROR" })

    const from = await call("GET", "/api/jobs/orders/history?from=yesterday")
    expect(from.status).toBe(400)
    expect(await from.json()).toEqual({ error: "from must be epoch milliseconds or an ISO 8601 timestamp", code: "VALIDATION_ERROR" })

    const limit = await call("GET", "/api/history?limit=0")
    expect(await limit.json()).toEqual({ error: "limit must be a positive integer", code: "VALIDATION_ERROR" })
  })

  it("pages the export feed by cursor", async () => {
    await createOrders()
    await call("POST", "/api/jobs/orders/trigger")
    await flush()

    const first = await (await call("GET", "/api/history/export?limit=1")).json()
    expect(first.entries).toHaveLength(1)
    expect(first.entries[0].kind).toBe("dispatched")
    expect(first.cursor).toBe(first.entries[0].seq)

    const second = await (await call("GET", `/api/history/export?cursor=${first.cursor}&limit=10`)).json()
    expect(second.entries.map((e: { kind: string }) => e.kind)).toEqual(["attempt"])
  })

  it("prunes history and records an audit trail", async () => {
    await createOrders()
    await call("POST", "/api/jobs/orders/disable")
    await call("POST", "/api/jobs/orders/trigger")
    await call("POST", "/api/jobs/orders/enable")
    await call("POST", "/api/jobs/orders/trigger")
    await flush()

    const missingAge = await call("POST", "/api/history/prune", {})
    expect(await missingAge.json()).toEqual({ error: "olderThanMs or olderThanDays is required", code: "VALIDATION_ERROR" })

    const res = await call("POST", "/api/history/prune", { olderThanMs: T0 + 1, actor: "ops" })
    const { audit } = await res.json()
    expect(audit).toMatchObject({ actor: "ops", olderThanMs: T0 + 1, removed: 2, jobs: ["orders"] })

    const remaining = await (await call("GET", "/api/history?jobId=orders")).json()
    expect(remaining.entries.map((e: { kind: string }) => e.kind)).toEqual(["attempt"])

    const trail = await (await call("GET", "/api/history/prune-audit")).json()
    expect(trail).toEqual({ records: [audit] })
  })

  it("resolves olderThanDays against the engine clock", async () => {
    await createOrders()
    await call("POST", "/api/jobs/orders/trigger")
    await flush()
    await engine.stop()
    await clock.advance(2 * DAY)

    const res = await call("POST", "/api/history/prune", { olderThanDays: 1 })
    const { audit } = await res.json()
    expect(audit).toMatchObject({ actor: "api", olderThanMs: T0 + DAY, prunedAtMs: T0 + 2 * DAY, removed: 1, jobs: ["orders"] })
  })
})
