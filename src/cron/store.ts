// src/cron/store.ts — Atomic JSON file store with backup recovery

import { mkdir, open, readFile, rename, stat, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import { Value } from "@sinclair/typebox/value"
import type { Static, TSchema } from "@sinclair/typebox"
import { StoreCorruptionError } from "./errors.js"
import { AsyncMutex } from "./mutex.js"

/** Thrown when a serialized write exceeds the configured size limit. */
export class WriteSizeLimitError extends Error {
  constructor(actualBytes: number, limitBytes: number) {
    super(`Write size ${actualBytes} bytes exceeds limit of ${limitBytes} bytes`)
    this.name = "WriteSizeLimitError"
  }
}

export interface AtomicJsonStoreOptions {
  /** Maximum serialized size in bytes. Default 10 MB. */
  maxSizeBytes?: number
}

const DEFAULT_MAX_SIZE = 10 * 1024 * 1024

/**
 * Durable JSON document validated against a TypeBox schema on every read.
 *
 * Write path: serialize -> size check -> write .tmp -> fsync -> move current
 * to .bak -> rename .tmp over primary -> fsync directory.
 *
 * Read path: primary -> .bak -> .tmp. Files that exist but fail to parse or
 * validate are quarantined before StoreCorruptionError is raised.
 */
export class AtomicJsonStore<S extends TSchema> {
  private readonly bakPath: string
  private readonly tmpPath: string
  private readonly maxSizeBytes: number
  private readonly mutex = new AsyncMutex()

  constructor(
    readonly filePath: string,
    private readonly schema: S,
    options?: AtomicJsonStoreOptions,
  ) {
    this.bakPath = filePath + ".bak"
    this.tmpPath = filePath + ".tmp"
    this.maxSizeBytes = options?.maxSizeBytes ?? DEFAULT_MAX_SIZE
  }

  async read(): Promise<Static<S> | null> {
    const candidates = [this.filePath, this.bakPath, this.tmpPath]
    for (const path of candidates) {
      const data = await this.tryReadFile(path)
      if (data !== null) return data
    }

    const existing: string[] = []
    for (const path of candidates) {
      if (await fileExists(path)) existing.push(path)
    }
    if (existing.length === 0) return null

    for (const path of existing) await quarantine(path)
    throw new StoreCorruptionError(this.filePath, "primary, backup and tmp all failed validation")
  }

  /** Writes are serialized so concurrent callers never interleave tmp files. */
  async write(data: Static<S>): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const json = JSON.stringify(data, sortedReplacer, 2) + "\n"
      const bytes = Buffer.byteLength(json, "utf-8")
      if (bytes > this.maxSizeBytes) {
        throw new WriteSizeLimitError(bytes, this.maxSizeBytes)
      }

      await mkdir(dirname(this.filePath), { recursive: true })
      await writeFile(this.tmpPath, json, "utf-8")
      await fsyncPath(this.tmpPath)

      if (await fileExists(this.filePath)) {
        await rename(this.filePath, this.bakPath)
      }
      await rename(this.tmpPath, this.filePath)
      await fsyncDir(dirname(this.filePath))
    })
  }

  private async tryReadFile(path: string): Promise<Static<S> | null> {
    let raw: string
    try {
      raw = await readFile(path, "utf-8")
    } catch {
      return null
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      return null
    }

    return Value.Check(this.schema, parsed) ? parsed : null
  }
}

/** JSON.stringify replacer that sorts object keys for deterministic output. */
function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return value
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  )
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

/** Move a corrupt file aside so the next boot does not trip over it again. */
async function quarantine(path: string): Promise<void> {
  try {
    await rename(path, `${path}.corrupt.${Date.now()}`)
  } catch (err) {
    console.warn(`[store] could not quarantine ${path}:`, err)
  }
}

async function fsyncPath(path: string): Promise<void> {
  const fh = await open(path, "r")
  try {
    await fh.sync()
  } finally {
    await fh.close()
  }
}

async function fsyncDir(dirPath: string): Promise<void> {
  try {
    await fsyncPath(dirPath)
  } catch {
    // directory fsync is unsupported on some platforms and containers
  }
}
