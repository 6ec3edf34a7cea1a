// tests/cadence/store.test.ts — AtomicJsonStore: atomic writes, backup fallback, corruption

import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Type } from "@sinclair/typebox"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { StoreCorruptionError } from "../../src/cron/errors.js"
import { AtomicJsonStore, WriteSizeLimitError } from "../../src/cron/store.js"

const DocSchema = Type.Object({ name: Type.String(), count: Type.Integer() })

describe("AtomicJsonStore", () => {
  let dir: string
  let path: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cadence-store-"))
    path = join(dir, "doc.json")
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  it("returns null when nothing was written", async () => {
    expect(await new AtomicJsonStore(path, DocSchema).read()).toBeNull()
  })

  it("writes sorted keys and reads them back", async () => {
    const store = new AtomicJsonStore(path, DocSchema)
    await store.write({ name: "orders", count: 3 })

    expect(await readFile(path, "utf-8")).toBe('{\n  "count": 3,\n  "name": "orders"\n}\n')
    expect(await store.read()).toEqual({ name: "orders", count: 3 })
  })

  it("keeps the previous version as a backup", async () => {
    const store = new AtomicJsonStore(path, DocSchema)
    await store.write({ name: "v1", count: 1 })
    await store.write({ name: "v2", count: 2 })

    expect(JSON.parse(await readFile(`${path}.bak`, "utf-8"))).toEqual({ name: "v1", count: 1 })
  })

  it("falls back to the backup when the primary fails validation", async () => {
    const store = new AtomicJsonStore(path, DocSchema)
    await store.write({ name: "v1", count: 1 })
    await store.write({ name: "v2", count: 2 })
    await writeFile(path, JSON.stringify({ name: "v3" }), "utf-8")

    expect(await store.read()).toEqual({ name: "v1", count: 1 })
  })

  it("quarantines every candidate and throws when none is valid", async () => {
    await writeFile(path, "{ torn", "utf-8")
    await writeFile(`${path}.bak`, "[]", "utf-8")

    await expect(new AtomicJsonStore(path, DocSchema).read()).rejects.toBeInstanceOf(StoreCorruptionError)

    const files = await readdir(dir)
    expect(files.filter((f) => f.startsWith("doc.json.corrupt.")).length).toBe(1)
    expect(files.filter((f) => f.startsWith("doc.json.bak.corrupt.")).length).toBe(1)
    expect(files).not.toContain("doc.json")
  })

  it("rejects writes over the size limit", async () => {
    const store = new AtomicJsonStore(path, DocSchema, { maxSizeBytes: 16 })
    await expect(store.write({ name: "far too long for the limit", count: 1 })).rejects.toBeInstanceOf(WriteSizeLimitError)
    expect(await store.read()).toBeNull()
  })

  it("serializes concurrent writes", async () => {
    const store = new AtomicJsonStore(path, DocSchema)
    await Promise.all([1, 2, 3].map((count) => store.write({ name: "n", count })))
    expect(await store.read()).toEqual({ name: "n", count: 3 })
  })
})
