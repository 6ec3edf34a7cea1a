// src/cron/handler-registry.ts — Capability table of invocable job handlers
//
// Job definitions reference handlers by opaque id. Ids are checked against
// this table when a job is created, so a typo fails the admin call instead of
// the first dispatch.

import { UnknownHandlerError } from "./errors.js"

export interface HandlerContext {
  jobId: string
  attempt: number
  scheduledAtMs: number
  params: Readonly<Record<string, unknown>>
  /** Aborted when the attempt times out. Cancellation is cooperative. */
  signal: AbortSignal
}

export interface HandlerResult {
  outcome: "success" | "failure"
  error?: string
  /** Free-form counters surfaced in logs (records read, written, ...). */
  stats?: Record<string, number>
}

/** Resolving with nothing counts as success; throwing counts as failure. */
export type JobHandler = (ctx: HandlerContext) => Promise<HandlerResult | void>

export class HandlerRegistry {
  private readonly handlers = new Map<string, JobHandler>()

  register(id: string, handler: JobHandler): this {
    if (this.handlers.has(id)) {
      throw new Error(`Handler already registered: ${id}`)
    }
    this.handlers.set(id, handler)
    return this
  }

  has(id: string): boolean {
    return this.handlers.has(id)
  }

  /** Throws UnknownHandlerError for ids that were never registered. */
  resolve(id: string): JobHandler {
    const handler = this.handlers.get(id)
    if (!handler) throw new UnknownHandlerError(id)
    return handler
  }

  ids(): string[] {
    return [...this.handlers.keys()].sort()
  }
}
