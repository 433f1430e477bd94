// src/relay/circuit-breaker.ts — Per-provider circuit breaker with rolling failure window
//
// closed ──F failures within W──▶ open ──cool-down──▶ half_open ──trial ok──▶ closed
//                                   ▲                      │
//                                   └──── trial failed ────┘ (cool-down grows)

import { EventEmitter } from "node:events"
import type { ProviderId } from "./types.js"

// ── Types ───────────────────────────────────────────────────

export type CircuitPhase = "closed" | "open" | "half_open"

export interface CircuitBreakerConfig {
  failureThreshold: number     // F, default 3
  windowMs: number             // W, default 60_000
  cooldownMs: number           // Base open duration, default 30_000
  cooldownMultiplier: number   // Growth per failed trial, default 2
  maxCooldownMs: number        // Cap for grown cool-down, default 300_000
}

export const DEFAULT_CIRCUIT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 3,
  windowMs: 60_000,
  cooldownMs: 30_000,
  cooldownMultiplier: 2,
  maxCooldownMs: 300_000,
}

export interface CircuitSnapshot {
  provider: ProviderId
  phase: CircuitPhase
  openedAt: number | null
  failuresInWindow: number
  cooldownMs: number
  trialInFlight: boolean
}

/** Token handed to a caller allowed through the gate. */
export interface CircuitPermit {
  readonly provider: ProviderId
  readonly trial: boolean
}

export interface CircuitTransition {
  provider: ProviderId
  from: CircuitPhase
  to: CircuitPhase
}

// ── CircuitBreaker ──────────────────────────────────────────

export class CircuitBreaker extends EventEmitter {
  private readonly config: CircuitBreakerConfig
  private readonly now: () => number
  private phase: CircuitPhase = "closed"
  private openedAt: number | null = null
  private currentCooldownMs: number
  private trialInFlight = false
  /** Timestamps of counted failures inside the rolling window. */
  private failureTimestamps: number[] = []

  constructor(
    readonly provider: ProviderId,
    config?: Partial<CircuitBreakerConfig>,
    now?: () => number,
  ) {
    super()
    this.config = { ...DEFAULT_CIRCUIT_CONFIG, ...config }
    if (this.config.failureThreshold < 1) {
      throw new Error(`failureThreshold must be >= 1 (got ${this.config.failureThreshold})`)
    }
    this.now = now ?? Date.now
    this.currentCooldownMs = this.config.cooldownMs
  }

  /**
   * Whether a call could be attempted right now. Never mutates state,
   * so it is safe for building candidate lists.
   */
  canAttempt(): boolean {
    switch (this.phase) {
      case "closed":
        return true
      case "open":
        return this.cooldownElapsed()
      case "half_open":
        return !this.trialInFlight
    }
  }

  /**
   * Authoritative gate, called immediately before each provider call.
   * Returns null when the call must not be attempted.
   */
  tryAcquire(): CircuitPermit | null {
    if (this.phase === "open") {
      if (!this.cooldownElapsed()) return null
      this.transitionTo("half_open")
    }

    if (this.phase === "half_open") {
      // Only one trial at a time; everyone else skips to fallback
      if (this.trialInFlight) return null
      this.trialInFlight = true
      return { provider: this.provider, trial: true }
    }

    return { provider: this.provider, trial: false }
  }

  recordSuccess(permit: CircuitPermit): void {
    if (permit.trial) {
      this.trialInFlight = false
      if (this.phase === "half_open") this.transitionTo("closed")
      return
    }
    if (this.phase === "closed") {
      this.failureTimestamps = []
    }
  }

  recordFailure(permit: CircuitPermit): void {
    if (permit.trial) {
      this.trialInFlight = false
      if (this.phase === "half_open") {
        this.currentCooldownMs = Math.min(
          this.config.maxCooldownMs,
          this.currentCooldownMs * this.config.cooldownMultiplier,
        )
        this.transitionTo("open")
      }
      return
    }

    if (this.phase !== "closed") return

    const currentTime = this.now()
    this.failureTimestamps.push(currentTime)
    this.pruneWindow(currentTime)

    if (this.failureTimestamps.length >= this.config.failureThreshold) {
      this.transitionTo("open")
    }
  }

  /**
   * Give back a permit whose outcome says nothing about provider health
   * (client error, local pool exhaustion). Frees the trial slot.
   */
  release(permit: CircuitPermit): void {
    if (permit.trial) this.trialInFlight = false
  }

  snapshot(): CircuitSnapshot {
    if (this.phase === "closed") this.pruneWindow(this.now())
    return {
      provider: this.provider,
      phase: this.phase,
      openedAt: this.openedAt,
      failuresInWindow: this.failureTimestamps.length,
      cooldownMs: this.currentCooldownMs,
      trialInFlight: this.trialInFlight,
    }
  }

  /** Manual reset to closed state. */
  reset(): void {
    this.trialInFlight = false
    this.transitionTo("closed")
  }

  private cooldownElapsed(): boolean {
    return this.now() - (this.openedAt ?? 0) >= this.currentCooldownMs
  }

  private pruneWindow(currentTime: number): void {
    const windowStart = currentTime - this.config.windowMs
    this.failureTimestamps = this.failureTimestamps.filter((ts) => ts > windowStart)
  }

  private transitionTo(next: CircuitPhase): void {
    const from = this.phase
    this.phase = next

    if (next === "open") {
      this.openedAt = this.now()
      this.failureTimestamps = []
    } else if (next === "closed") {
      this.openedAt = null
      this.failureTimestamps = []
      this.currentCooldownMs = this.config.cooldownMs
    }

    if (from !== next) {
      const event: CircuitTransition = { provider: this.provider, from, to: next }
      this.emit("transition", event)
    }
  }
}

// ── Per-provider set ────────────────────────────────────────

/**
 * One independent breaker per provider. No state is shared between
 * providers, so one backend's outage never serializes calls to another.
 */
export class CircuitBreakerSet {
  private readonly breakers = new Map<ProviderId, CircuitBreaker>()

  constructor(
    providers: readonly ProviderId[],
    config?: Partial<CircuitBreakerConfig>,
    now?: () => number,
  ) {
    for (const provider of providers) {
      this.breakers.set(provider, new CircuitBreaker(provider, config, now))
    }
  }

  get(provider: ProviderId): CircuitBreaker {
    const breaker = this.breakers.get(provider)
    if (!breaker) throw new Error(`No circuit breaker registered for provider "${provider}"`)
    return breaker
  }

  onTransition(cb: (event: CircuitTransition) => void): void {
    for (const breaker of this.breakers.values()) {
      breaker.on("transition", cb)
    }
  }

  snapshot(): CircuitSnapshot[] {
    return Array.from(this.breakers.values(), (b) => b.snapshot())
  }
}
