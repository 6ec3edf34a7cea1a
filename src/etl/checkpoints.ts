// src/etl/checkpoints.ts — Checkpoint stores for ETL cursors

import { Type } from "@sinclair/typebox"
import { AsyncMutex } from "../cron/mutex.js"
import { AtomicJsonStore } from "../cron/store.js"
import type { CheckpointStore } from "./ports.js"

const CheckpointFileSchema = Type.Object({
  version: Type.Literal(1),
  cursors: Type.Record(Type.String(), Type.String()),
})

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly cursors = new Map<string, string>()

  async load(jobId: string): Promise<string | null> {
    return this.cursors.get(jobId) ?? null
  }

  async save(jobId: string, cursor: string): Promise<void> {
    this.cursors.set(jobId, cursor)
  }
}

/** All job cursors in one atomically rewritten JSON file. */
export class JsonCheckpointStore implements CheckpointStore {
  private readonly file: AtomicJsonStore<typeof CheckpointFileSchema>
  private readonly mutex = new AsyncMutex()
  private cursors: Record<string, string> | null = null

  constructor(filePath: string) {
    this.file = new AtomicJsonStore(filePath, CheckpointFileSchema)
  }

  async load(jobId: string): Promise<string | null> {
    const cursors = await this.loadAll()
    return cursors[jobId] ?? null
  }

  async save(jobId: string, cursor: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const next = { ...(await this.loadAll()), [jobId]: cursor }
      await this.file.write({ version: 1, cursors: next })
      this.cursors = next
    })
  }

  private async loadAll(): Promise<Record<string, string>> {
    if (this.cursors === null) {
      const loaded = await this.file.read()
      this.cursors = loaded ? loaded.cursors : {}
    }
    return this.cursors
  }
}
