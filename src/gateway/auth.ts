// src/gateway/auth.ts — Admin API bearer token and cross-origin access

import { createHash, timingSafeEqual } from "node:crypto"
import type { Context, MiddlewareHandler, Next } from "hono"

const BEARER = "Bearer "

/** Compare fixed-size digests so neither length nor content leaks through timing. */
function tokensMatch(presented: string, expected: string): boolean {
  const digest = (value: string) => createHash("sha256").update(value).digest()
  return timingSafeEqual(digest(presented), digest(expected))
}

/** Require `Authorization: Bearer <token>` on every request. No token configured means open access. */
export function requireBearer(token: string): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    if (token === "") return next()

    const header = c.req.header("Authorization") ?? ""
    if (!header.startsWith(BEARER)) {
      return c.json({ error: "Unauthorized", code: "AUTH_REQUIRED" }, 401)
    }
    if (!tokensMatch(header.slice(BEARER.length), token)) {
      return c.json({ error: "Unauthorized", code: "AUTH_INVALID" }, 401)
    }
    return next()
  }
}

/** Reflect allowed origins in CORS headers and answer preflights directly. */
export function allowOrigins(patterns: readonly string[]): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const origin = c.req.header("Origin")
    if (origin !== undefined && originMatches(origin, patterns)) {
      c.header("Access-Control-Allow-Origin", origin)
      c.header("Access-Control-Allow-Methods", "GET, POST, PATCH, DELETE, OPTIONS")
      c.header("Access-Control-Allow-Headers", "Content-Type, Authorization")
    }
    if (c.req.method === "OPTIONS") return c.body(null, 204)
    return next()
  }
}

/**
 * A pattern is `*`, a full origin, or a host[:port] where `*` stands for any
 * run of characters, e.g. `localhost:*` or `*.internal:8080`.
 */
export function originMatches(origin: string, patterns: readonly string[]): boolean {
  let host: string
  try {
    host = new URL(origin).host
  } catch {
    return false
  }
  return patterns.some((pattern) => pattern === "*" || pattern === origin || wildcardMatch(pattern, host))
}

function wildcardMatch(pattern: string, value: string): boolean {
  const parts = pattern.split("*")
  const first = parts[0] ?? ""
  if (parts.length === 1) return pattern === value
  const last = parts[parts.length - 1] ?? ""
  if (!value.startsWith(first) || value.length < first.length + last.length) return false

  let pos = first.length
  for (const middle of parts.slice(1, -1)) {
    const at = value.indexOf(middle, pos)
    if (at === -1) return false
    pos = at + middle.length
  }
  return value.length - pos >= last.length && value.endsWith(last)
}
