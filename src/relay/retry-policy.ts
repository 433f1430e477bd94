// src/relay/retry-policy.ts — Exponential backoff with jitter
//
// delay(attempt) = min(cap, base * 2^attempt) ± jitter
// Owned by the orchestrator's attempt loop; provider adapters never sleep.

import { isRetryable, type ProviderErrorKind } from "./errors.js"

export interface RetryPolicyConfig {
  baseDelayMs: number     // Default: 500
  maxDelayMs: number      // Cap, default: 8000
  jitterRatio: number     // ±fraction of the computed delay, default: 0.2
}

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  jitterRatio: 0.2,
}

export class RetryPolicy {
  readonly config: RetryPolicyConfig
  private readonly random: () => number

  constructor(config?: Partial<RetryPolicyConfig>, random: () => number = Math.random) {
    this.config = { ...DEFAULT_RETRY_POLICY, ...config }
    if (this.config.jitterRatio < 0 || this.config.jitterRatio > 1) {
      throw new Error(`jitterRatio must be within [0, 1] (got ${this.config.jitterRatio})`)
    }
    this.random = random
  }

  /**
   * Delay before the retry that follows failed attempt `attempt` (0-based).
   * Never negative.
   */
  delayFor(attempt: number): number {
    const exp = this.config.baseDelayMs * Math.pow(2, Math.max(0, attempt))
    const capped = Math.min(this.config.maxDelayMs, exp)
    const jitter = (this.random() * 2 - 1) * capped * this.config.jitterRatio
    return Math.max(0, Math.round(capped + jitter))
  }

  /**
   * Whether failed attempt `attempt` (0-based) on a provider allowed
   * `maxAttempts` tries should be followed by another try on the same provider.
   */
  shouldRetry(attempt: number, maxAttempts: number, kind: ProviderErrorKind): boolean {
    return attempt + 1 < maxAttempts && isRetryable(kind)
  }
}

/** Timer-based sleep; resolves early (without error) when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}
