// src/index.ts — cadence entry point
// Boot sequence: config → handlers → stores → engine (recovery, seed, first tick) → gateway → serve

import { readFile } from "node:fs/promises"
import { serve } from "@hono/node-server"
import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { AlertService } from "./alerting/alert-service.js"
import { loadConfig } from "./config.js"
import { SchedulerEngine } from "./cron/engine.js"
import { HandlerRegistry } from "./cron/handler-registry.js"
import { JobDefinitionInputSchema, JobDefinitionStore, type JobDefinitionInput } from "./cron/job-store.js"
import { RunHistoryLedger } from "./cron/ledger.js"
import { JsonlLedgerBackend } from "./cron/ledger-backend.js"
import { JsonCheckpointStore } from "./etl/checkpoints.js"
import { JsonlFileSink, JsonlFileSource } from "./etl/jsonl.js"
import { createEtlHandler } from "./etl/runner.js"
import { createApp } from "./gateway/server.js"

const SeedFileSchema = Type.Array(JobDefinitionInputSchema)

async function loadSeedJobs(path: string): Promise<JobDefinitionInput[]> {
  if (!path) return []
  const raw: unknown = JSON.parse(await readFile(path, "utf-8"))
  if (!Value.Check(SeedFileSchema, raw)) {
    const first = Value.Errors(SeedFileSchema, raw).First()
    throw new Error(`${path}: invalid job definitions (${first ? `${first.path} ${first.message}` : "schema mismatch"})`)
  }
  return raw
}

function stringParam(params: Readonly<Record<string, unknown>>, key: string): string {
  const value = params[key]
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`params.${key} must be a non-empty string`)
  }
  return value
}

async function main() {
  const bootStart = Date.now()
  console.log("[cadence] booting...")

  // 1. Load config
  const config = loadConfig()
  console.log(`[cadence] config loaded: port=${config.port}, dataDir=${config.dataDir}, concurrency=${config.engine.concurrency}`)

  // 2. Handler capability table
  const checkpoints = new JsonCheckpointStore(config.checkpointsFile)
  const handlers = new HandlerRegistry()
    .register("etl.jsonl-copy", createEtlHandler<unknown, unknown>({
      source: (ctx) => new JsonlFileSource(stringParam(ctx.params, "input")),
      sink: (ctx) => new JsonlFileSink(stringParam(ctx.params, "output")),
      transform: (record) => record,
      checkpoints,
    }))
    .register("noop", async () => {})
  console.log(`[cadence] handlers: ${handlers.ids().join(", ")}`)

  // 3. Stores and engine
  const store = new JobDefinitionStore(config.jobsFile, {
    handlers,
    defaults: { timeoutMs: config.jobDefaults.timeoutMs },
  })
  const ledger = new RunHistoryLedger(new JsonlLedgerBackend(config.runsDir, config.pruneAuditFile), {
    writeAttempts: config.ledger.writeAttempts,
  })
  const alerts = new AlertService({
    webhookUrl: config.alerts.webhookUrl || undefined,
    deduplicationWindowMs: config.alerts.deduplicationWindowMs,
  })
  const engine = new SchedulerEngine({ store, ledger, handlers, alerts }, config.engine)

  // 4. Start: recovery, seed, first tick
  const seed = await loadSeedJobs(config.seedJobsFile)
  await engine.start(seed)

  // 5. Gateway
  const app = createApp(config, { engine, ledger })
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[cadence] listening on ${info.address}:${info.port} (boot ${Date.now() - bootStart}ms)`)
  })

  // 6. Graceful shutdown: close inbound first, then drain the engine
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    console.log(`[cadence] ${signal} received, shutting down gracefully...`)

    server.close()
    await engine.stop()

    console.log(`[cadence] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    setTimeout(() => {
      console.error("[cadence] forced shutdown after deadline")
      process.exit(1)
    }, config.engine.shutdownTimeoutMs + 5_000).unref()

    gracefulShutdown(signal).catch((err: unknown) => {
      console.error("[cadence] shutdown error:", err)
      process.exit(1)
    })
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[cadence] fatal:", err)
  process.exit(1)
})
