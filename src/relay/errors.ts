// src/relay/errors.ts — Relay typed error classes and failure taxonomy

import type { ProviderId } from "./types.js"

/** Terminal error codes that cross the orchestrator boundary */
export type RelayErrorCode =
  | "RATE_LIMITED"
  | "CONTENT_REJECTED"
  | "PROVIDER_UNAVAILABLE"
  | "TIMEOUT"
  | "INVALID_RESPONSE"
  | "ALL_PROVIDERS_EXHAUSTED"
  | "CONFIG_INVALID"

/** Typed error for all relay operations */
export class RelayError extends Error {
  readonly name = "RelayError"
  readonly code: RelayErrorCode
  readonly context: Record<string, unknown>

  constructor(
    code: RelayErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(`[relay] ${code}: ${message}`, options)
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    const cause = this.cause
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      ...(cause instanceof Error ? { cause: describeCause(cause) } : {}),
    }
  }
}

export function isRelayError(err: unknown, code?: RelayErrorCode): err is RelayError {
  return err instanceof RelayError && (code === undefined || err.code === code)
}

// --- Provider call errors ---

/**
 * Failure kinds raised by provider adapters and the attempt loop.
 *   network, timeout, server, invalid_response → count toward circuit and health
 *   client, rate_limited                       → never trip the circuit; move on to the next provider
 *   pool_exhausted                             → local back-pressure, never trips, retried
 */
export type ProviderErrorKind =
  | "network"
  | "timeout"
  | "server"
  | "invalid_response"
  | "client"
  | "rate_limited"
  | "pool_exhausted"

const COUNTED_KINDS: ReadonlySet<ProviderErrorKind> = new Set([
  "network",
  "timeout",
  "server",
  "invalid_response",
])

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set([
  "network",
  "timeout",
  "server",
  "invalid_response",
  "pool_exhausted",
])

export function countsAsFailure(kind: ProviderErrorKind): boolean {
  return COUNTED_KINDS.has(kind)
}

export function isRetryable(kind: ProviderErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind)
}

export class ProviderCallError extends Error {
  readonly name = "ProviderCallError"
  readonly provider: ProviderId
  readonly kind: ProviderErrorKind
  readonly statusCode?: number

  constructor(opts: {
    provider: ProviderId
    kind: ProviderErrorKind
    message: string
    statusCode?: number
    cause?: unknown
  }) {
    super(`[${opts.provider}] ${opts.kind}: ${opts.message}`, { cause: opts.cause })
    this.provider = opts.provider
    this.kind = opts.kind
    this.statusCode = opts.statusCode
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      provider: this.provider,
      kind: this.kind,
      message: this.message,
      status_code: this.statusCode,
    }
  }
}

/** Map an HTTP status from a provider into a failure kind. */
export function kindFromStatus(status: number): ProviderErrorKind {
  if (status === 429) return "rate_limited"
  if (status === 408) return "timeout"
  if (status >= 500) return "server"
  return "client"
}

/**
 * Normalize anything thrown during an attempt into a ProviderCallError.
 * Unknown errors are treated as network failures.
 */
export function toProviderCallError(provider: ProviderId, err: unknown): ProviderCallError {
  if (err instanceof ProviderCallError) return err
  if (err instanceof Error && err.name === "AbortError") {
    return new ProviderCallError({ provider, kind: "timeout", message: "request aborted", cause: err })
  }
  const message = err instanceof Error ? err.message : String(err)
  return new ProviderCallError({ provider, kind: "network", message, cause: err })
}

function describeCause(err: Error): Record<string, unknown> {
  if (err instanceof ProviderCallError || err instanceof RelayError) return err.toJSON()
  return { error: err.name, message: err.message }
}
