// src/etl/runner.ts — Generic extract → transform → load handler

import type { HandlerContext, HandlerResult, JobHandler } from "../cron/handler-registry.js"
import { errorMessage } from "../cron/errors.js"
import type { CheckpointStore, PortProvider, RecordSink, RecordSource } from "./ports.js"

// ── Default limits ─────────────────────────────────────────

const DEFAULT_BATCH_SIZE = 500
const DEFAULT_MAX_RECORDS = 100_000

/** A null result filters the record out of the load. */
export type Transform<T, U> = (record: T, ctx: HandlerContext) => U | null | Promise<U | null>

export interface EtlHandlerOptions<T, U> {
  source: PortProvider<RecordSource<T>>
  sink: PortProvider<RecordSink<U>>
  transform: Transform<T, U>
  /** Records per read/write round trip. `params.batchSize` overrides it per job. */
  batchSize?: number
  /** Upper bound on records read in one attempt. `params.maxRecords` overrides it per job. */
  maxRecords?: number
  /** "fail" aborts the attempt on the first transform error; "skip" counts and continues. */
  onTransformError?: "fail" | "skip"
  checkpoints?: CheckpointStore
}

export interface EtlRunStats {
  read: number
  written: number
  filtered: number
  rejected: number
  batches: number
}

/**
 * Build a job handler that pages records from the source, transforms them and
 * writes each batch to the sink. The abort signal is checked between batches.
 * With a checkpoint store, the cursor after each committed batch is saved and
 * the next attempt (retry or later fire) resumes from it.
 */
export function createEtlHandler<T, U>(opts: EtlHandlerOptions<T, U>): JobHandler {
  const onTransformError = opts.onTransformError ?? "fail"

  return async (ctx: HandlerContext): Promise<HandlerResult> => {
    const source = resolveSource(opts.source, ctx)
    const sink = resolveSink(opts.sink, ctx)
    const batchSize = positiveIntParam(ctx.params, "batchSize") ?? opts.batchSize ?? DEFAULT_BATCH_SIZE
    const maxRecords = positiveIntParam(ctx.params, "maxRecords") ?? opts.maxRecords ?? DEFAULT_MAX_RECORDS

    const stats: EtlRunStats = { read: 0, written: 0, filtered: 0, rejected: 0, batches: 0 }
    let cursor = opts.checkpoints ? await opts.checkpoints.load(ctx.jobId) : null
    let lastRejection: string | undefined

    while (stats.read < maxRecords) {
      if (ctx.signal.aborted) {
        return { outcome: "failure", error: `aborted after ${stats.batches} batch(es)`, stats: { ...stats } }
      }

      const limit = Math.min(batchSize, maxRecords - stats.read)
      const readFrom = cursor
      const batch = await source.read({ cursor: readFrom, limit, signal: ctx.signal })
      stats.read += batch.records.length

      const out: U[] = []
      for (const record of batch.records) {
        try {
          const transformed = await opts.transform(record, ctx)
          if (transformed === null) stats.filtered++
          else out.push(transformed)
        } catch (err) {
          if (onTransformError === "fail") {
            return { outcome: "failure", error: `transform failed: ${errorMessage(err)}`, stats: { ...stats } }
          }
          stats.rejected++
          lastRejection = errorMessage(err)
        }
      }

      if (out.length > 0) {
        const { written } = await sink.write(out, {
          idempotencyKey: `${ctx.jobId}:${ctx.scheduledAtMs}:${readFrom ?? "start"}`,
          signal: ctx.signal,
        })
        stats.written += written
      }
      stats.batches++

      if (batch.cursor !== null) {
        cursor = batch.cursor
        if (opts.checkpoints) await opts.checkpoints.save(ctx.jobId, cursor)
      }
      // a short batch means the source is drained for now
      if (batch.cursor === null || batch.records.length < limit) break
    }

    console.log(
      `[etl] ${ctx.jobId} attempt ${ctx.attempt}: ${source.id} → ${sink.id} read=${stats.read} written=${stats.written} filtered=${stats.filtered} rejected=${stats.rejected}`,
    )
    if (lastRejection !== undefined) {
      console.warn(`[etl] ${ctx.jobId}: ${stats.rejected} record(s) rejected, last error: ${lastRejection}`)
    }
    return { outcome: "success", stats: { ...stats } }
  }
}

// ── Helpers ────────────────────────────────────────────────

function resolveSource<T>(provider: PortProvider<RecordSource<T>>, ctx: HandlerContext): RecordSource<T> {
  return typeof provider === "function" ? provider(ctx) : provider
}

function resolveSink<U>(provider: PortProvider<RecordSink<U>>, ctx: HandlerContext): RecordSink<U> {
  return typeof provider === "function" ? provider(ctx) : provider
}

function positiveIntParam(params: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = params[key]
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined
}
