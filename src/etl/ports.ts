// src/etl/ports.ts — Store-facing ports for ETL handlers
//
// The engine never talks to a storage engine directly. Handlers built by
// createEtlHandler() read through a RecordSource and write through a
// RecordSink; adapters for concrete stores implement these.

import type { HandlerContext } from "../cron/handler-registry.js"

export interface ReadRequest {
  /** Opaque position returned by the previous read; null starts from the beginning. */
  cursor: string | null
  limit: number
  signal: AbortSignal
}

export interface RecordBatch<T> {
  records: T[]
  /**
   * Position after this batch, or null when the source cannot resume. A batch
   * shorter than the requested limit ends the run.
   */
  cursor: string | null
}

export interface RecordSource<T> {
  readonly id: string
  read(req: ReadRequest): Promise<RecordBatch<T>>
}

export interface WriteRequest {
  /**
   * `{jobId}:{scheduledAtMs}:{cursor}` of the position the batch was read from.
   * A retry that re-reads the same position reuses the key, so a sink can drop replays.
   */
  idempotencyKey: string
  signal: AbortSignal
}

export interface RecordSink<U> {
  readonly id: string
  write(records: U[], req: WriteRequest): Promise<{ written: number }>
}

/** Last committed source cursor per job, so retries and later runs resume. */
export interface CheckpointStore {
  load(jobId: string): Promise<string | null>
  save(jobId: string, cursor: string): Promise<void>
}

/** A port instance, or a factory that builds one from the run's context. */
export type PortProvider<P> = P | ((ctx: HandlerContext) => P)
