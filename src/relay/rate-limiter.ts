// src/relay/rate-limiter.ts — Dual-scope sliding-window rate limiter
// Per-user and per-conversation admission. Rollover is computed lazily from
// timestamps at check time; there is no background sweep.

// --- Sliding window ---

/**
 * Timestamp log of admitted requests per key. A key's count is the number
 * of timestamps newer than `now - windowMs`.
 */
export class SlidingWindowCounter {
  private readonly hits = new Map<string, number[]>()

  constructor(
    readonly limit: number,
    readonly windowMs: number,
    private readonly clock: () => number = Date.now,
  ) {
    if (limit <= 0 || windowMs <= 0) {
      throw new Error(`Invalid sliding window config: limit=${limit}, windowMs=${windowMs}`)
    }
  }

  /** Requests still admissible for `key` in the current window */
  remaining(key: string): number {
    return Math.max(0, this.limit - this.prune(key).length)
  }

  /** Time in ms until one more request would be admitted */
  retryAfterMs(key: string): number {
    const log = this.prune(key)
    if (log.length < this.limit) return 0
    const oldest = log[log.length - this.limit]
    return Math.max(0, oldest + this.windowMs - this.clock())
  }

  /** Record one admitted request. Callers check `remaining` first. */
  record(key: string): void {
    const log = this.prune(key)
    log.push(this.clock())
    this.hits.set(key, log)
  }

  count(key: string): number {
    return this.prune(key).length
  }

  reset(key?: string): void {
    if (key === undefined) this.hits.clear()
    else this.hits.delete(key)
  }

  /** Number of keys currently tracked (empty logs are dropped). */
  get size(): number {
    return this.hits.size
  }

  private prune(key: string): number[] {
    const log = this.hits.get(key)
    if (!log) return []
    const windowStart = this.clock() - this.windowMs
    let drop = 0
    while (drop < log.length && log[drop] <= windowStart) drop++
    if (drop === log.length) {
      this.hits.delete(key)
      return []
    }
    if (drop > 0) log.splice(0, drop)
    return log
  }
}

// --- Config ---

export interface RateLimitConfig {
  perUser: { limit: number; windowMs: number }
  perPeer: { limit: number; windowMs: number }
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  perUser: { limit: 10, windowMs: 60_000 },
  perPeer: { limit: 30, windowMs: 60_000 },
}

export type RateLimitScope = "user" | "peer"

export type RateLimitDecision =
  | { allowed: true; remaining: { user: number; peer: number } }
  | { allowed: false; scope: RateLimitScope; retryAfterMs: number }

// --- Dual-scope limiter ---

export class RateLimiter {
  private readonly users: SlidingWindowCounter
  private readonly peers: SlidingWindowCounter

  constructor(config: Partial<RateLimitConfig> = {}, clock: () => number = Date.now) {
    const cfg = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config }
    this.users = new SlidingWindowCounter(cfg.perUser.limit, cfg.perUser.windowMs, clock)
    this.peers = new SlidingWindowCounter(cfg.perPeer.limit, cfg.perPeer.windowMs, clock)
  }

  /**
   * Admit a request only if both the user and the conversation window have
   * capacity. An admitted request is recorded in both; a denial records nothing.
   */
  tryAcquire(userId: string, peerId: string): RateLimitDecision {
    if (this.users.remaining(userId) === 0) {
      return { allowed: false, scope: "user", retryAfterMs: this.users.retryAfterMs(userId) }
    }
    if (this.peers.remaining(peerId) === 0) {
      return { allowed: false, scope: "peer", retryAfterMs: this.peers.retryAfterMs(peerId) }
    }
    this.users.record(userId)
    this.peers.record(peerId)
    return {
      allowed: true,
      remaining: { user: this.users.remaining(userId), peer: this.peers.remaining(peerId) },
    }
  }

  getStatus(userId: string, peerId: string): { user: number; peer: number } {
    return { user: this.users.count(userId), peer: this.peers.count(peerId) }
  }

  reset(scope?: RateLimitScope, key?: string): void {
    if (scope === undefined || scope === "user") this.users.reset(key)
    if (scope === undefined || scope === "peer") this.peers.reset(key)
  }
}
