// src/config.ts — Configuration loader from environment variables

import { availableParallelism } from "node:os"
import { join } from "node:path"

export interface CadenceConfig {
  // Gateway
  port: number
  host: string

  // Persistence
  dataDir: string
  /** Job definitions (atomic JSON store). */
  jobsFile: string
  /** One <jobId>.jsonl run history file per job. */
  runsDir: string
  pruneAuditFile: string
  /** ETL source cursors. */
  checkpointsFile: string
  /** Optional JSON array of job definitions created at boot when missing. */
  seedJobsFile: string

  // Auth
  auth: {
    /** Empty disables auth (dev mode). */
    bearerToken: string
    corsOrigins: string[]
  }

  // Engine
  engine: {
    tickIntervalMs: number
    /** Worker slots */
    concurrency: number
    /** Global dispatch queue depth */
    queueDepth: number
    /** Hard deadline for draining running attempts on shutdown */
    shutdownTimeoutMs: number
  }

  jobDefaults: {
    timeoutMs: number
  }

  ledger: {
    /** Tries per append before the job is faulted */
    writeAttempts: number
  }

  alerts: {
    webhookUrl: string
    deduplicationWindowMs: number
  }
}

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(envKey: string, fallback: string): number {
  const raw = process.env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function parsePositiveIntEnv(envKey: string, fallback: string): number {
  const value = parseIntEnv(envKey, fallback)
  if (value < 1) {
    throw new Error(`${envKey} must be at least 1 (got ${value})`)
  }
  return value
}

export function loadConfig(): CadenceConfig {
  const dataDir = process.env.DATA_DIR ?? "./data"

  return {
    port: parseIntEnv("PORT", "3000"),
    host: process.env.HOST ?? "0.0.0.0",

    dataDir,
    jobsFile: join(dataDir, "jobs.json"),
    runsDir: join(dataDir, "runs"),
    pruneAuditFile: join(dataDir, "prune-audit.jsonl"),
    checkpointsFile: join(dataDir, "checkpoints.json"),
    seedJobsFile: process.env.CADENCE_JOBS_FILE ?? "",

    auth: {
      bearerToken: process.env.CADENCE_AUTH_TOKEN ?? "",
      corsOrigins: (process.env.CADENCE_CORS_ORIGINS ?? "localhost:*").split(",").map((o) => o.trim()).filter(Boolean),
    },

    engine: {
      tickIntervalMs: parsePositiveIntEnv("CADENCE_TICK_MS", "1000"),
      concurrency: parsePositiveIntEnv(
        "CADENCE_CONCURRENCY",
        String(Math.min(availableParallelism(), 8)),
      ),
      queueDepth: parseIntEnv("CADENCE_QUEUE_DEPTH", "16"),
      shutdownTimeoutMs: parsePositiveIntEnv("CADENCE_SHUTDOWN_MS", "30000"),
    },

    jobDefaults: {
      timeoutMs: parsePositiveIntEnv("CADENCE_DEFAULT_TIMEOUT_MS", "300000"),
    },

    ledger: {
      writeAttempts: parsePositiveIntEnv("CADENCE_LEDGER_WRITE_ATTEMPTS", "3"),
    },

    alerts: {
      webhookUrl: process.env.CADENCE_ALERT_WEBHOOK_URL ?? "",
      deduplicationWindowMs: parseIntEnv("CADENCE_ALERT_DEDUP_MS", "900000"),
    },
  }
}
