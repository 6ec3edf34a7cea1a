// src/etl/jsonl.ts — JSON Lines file adapters for the ETL ports
//
// Local-disk adapters. The source cursor is the index of the next line to read.

import { mkdir, open, readFile } from "node:fs/promises"
import { dirname } from "node:path"
import type { ReadRequest, RecordBatch, RecordSink, RecordSource, WriteRequest } from "./ports.js"

export class JsonlFileSource implements RecordSource<unknown> {
  readonly id: string

  constructor(private readonly filePath: string) {
    this.id = `jsonl:${filePath}`
  }

  async read(req: ReadRequest): Promise<RecordBatch<unknown>> {
    let raw: string
    try {
      raw = await readFile(this.filePath, { encoding: "utf-8", signal: req.signal })
    } catch (err) {
      if (isEnoent(err)) return { records: [], cursor: req.cursor }
      throw err
    }

    const lines = raw.split("\n").filter((line) => line.trim().length > 0)
    const start = req.cursor === null ? 0 : parseCursor(req.cursor)
    const slice = lines.slice(start, start + req.limit)
    const records = slice.map((line, i) => {
      try {
        return JSON.parse(line)
      } catch {
        throw new Error(`${this.filePath}:${start + i + 1} is not valid JSON`)
      }
    })
    const end = start + slice.length
    return { records, cursor: String(end) }
  }
}

/** Appends one JSON document per line; every write is fsynced. */
export class JsonlFileSink implements RecordSink<unknown> {
  readonly id: string

  constructor(private readonly filePath: string) {
    this.id = `jsonl:${filePath}`
  }

  async write(records: unknown[], _req: WriteRequest): Promise<{ written: number }> {
    if (records.length === 0) return { written: 0 }
    await mkdir(dirname(this.filePath), { recursive: true })
    const fh = await open(this.filePath, "a")
    try {
      await fh.writeFile(records.map((r) => JSON.stringify(r)).join("\n") + "\n", "utf-8")
      await fh.sync()
    } finally {
      await fh.close()
    }
    return { written: records.length }
  }
}

function parseCursor(cursor: string): number {
  const n = Number(cursor)
  if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid JSONL cursor: ${cursor}`)
  return n
}

function isEnoent(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
}
