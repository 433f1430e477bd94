// src/gateway/errors.ts — RelayError → HTTP response mapping

import type { Context } from "hono"
import { isRelayError, type RelayErrorCode } from "../relay/errors.js"
import { errorMessage, type RelayLogger } from "../relay/logger.js"

type ErrorStatus = 400 | 422 | 429 | 500 | 502 | 503 | 504

/** Map RelayError codes to HTTP status codes */
export function statusForCode(code: RelayErrorCode): ErrorStatus {
  switch (code) {
    case "RATE_LIMITED": return 429
    case "CONTENT_REJECTED": return 422
    case "TIMEOUT": return 504
    case "PROVIDER_UNAVAILABLE": return 503
    case "ALL_PROVIDERS_EXHAUSTED": return 503
    case "INVALID_RESPONSE": return 502
    case "CONFIG_INVALID": return 400
  }
}

/** Public context fields per code; everything else stays in the logs */
const PUBLIC_CONTEXT: Partial<Record<RelayErrorCode, readonly string[]>> = {
  RATE_LIMITED: ["scope", "retryAfterMs"],
  CONTENT_REJECTED: ["stage", "rule"],
  CONFIG_INVALID: ["path", "field"],
  ALL_PROVIDERS_EXHAUSTED: ["attemptCount"],
}

export function errorResponse(c: Context, err: unknown, log: RelayLogger) {
  if (!isRelayError(err)) {
    log.error("unhandled error", { path: c.req.path, error: errorMessage(err) })
    return c.json({ error: "Internal error", code: "INTERNAL" }, 500)
  }

  const context: Record<string, unknown> = {}
  for (const field of PUBLIC_CONTEXT[err.code] ?? []) {
    if (err.context[field] !== undefined) context[field] = err.context[field]
  }

  const retryAfterMs = err.context.retryAfterMs
  if (err.code === "RATE_LIMITED" && typeof retryAfterMs === "number") {
    c.header("Retry-After", String(Math.max(1, Math.ceil(retryAfterMs / 1000))))
  }

  return c.json({ error: err.message, code: err.code, context }, statusForCode(err.code))
}
