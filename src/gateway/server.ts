// src/gateway/server.ts — Hono HTTP app: health plus the authenticated admin API

import { Hono } from "hono"
import type { CadenceConfig } from "../config.js"
import type { EngineStats } from "../cron/engine.js"
import { allowOrigins, requireBearer } from "./auth.js"
import { createJobsApi, type HistoryLedgerLike, type JobsEngineLike } from "./jobs-api.js"

export interface AppOptions {
  engine: JobsEngineLike & {
    stats(): EngineStats
    isRunning(): boolean
  }
  ledger: HistoryLedgerLike
}

export function createApp(config: Pick<CadenceConfig, "auth">, options: AppOptions) {
  const app = new Hono()

  app.use("*", allowOrigins(config.auth.corsOrigins))

  // Health endpoint (no auth required)
  app.get("/health", (c) => {
    const running = options.engine.isRunning()
    return c.json(
      {
        status: running ? "healthy" : "stopped",
        uptime: process.uptime(),
        engine: options.engine.stats(),
      },
      running ? 200 : 503,
    )
  })

  app.use("/api/*", requireBearer(config.auth.bearerToken))
  app.route("/api", createJobsApi({ engine: options.engine, ledger: options.ledger }))

  app.notFound((c) => c.json({ error: "Not found", code: "ROUTE_NOT_FOUND" }, 404))

  return app
}
