// src/gateway/auth.ts — Bearer token middleware

import { createHash, timingSafeEqual } from "node:crypto"
import type { Context, Next } from "hono"

/** Timing-safe string comparison (constant-time even for different lengths) */
export function safeCompare(a: string, b: string): boolean {
  const bufA = createHash("sha256").update(a).digest()
  const bufB = createHash("sha256").update(b).digest()
  return timingSafeEqual(bufA, bufB)
}

/**
 * Bearer token auth. An empty token either leaves the route open
 * (`whenUnset: "open"`, dev mode) or closes it (`"closed"`).
 */
export function bearerAuth(token: string, whenUnset: "open" | "closed") {
  return async (c: Context, next: Next) => {
    if (!token) {
      if (whenUnset === "open") return next()
      return c.json({ error: "Endpoint disabled", code: "AUTH_DISABLED" }, 403)
    }

    const authHeader = c.req.header("Authorization")
    if (!authHeader?.startsWith("Bearer ")) {
      return c.json({ error: "Unauthorized", code: "AUTH_REQUIRED" }, 401)
    }

    if (!safeCompare(authHeader.slice(7), token)) {
      return c.json({ error: "Unauthorized", code: "AUTH_INVALID" }, 401)
    }

    return next()
  }
}
