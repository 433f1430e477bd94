// src/relay/health.ts — Provider health monitor with periodic probes
//
// Liveness per provider, fed by two sources:
//   1. scheduled probes (independent of request traffic)
//   2. real call outcomes reported by the orchestrator
// K consecutive failures → degraded, downThreshold → down, any success → healthy.

import { EventEmitter } from "node:events"
import { countsAsFailure, toProviderCallError } from "./errors.js"
import type { ProviderErrorKind } from "./errors.js"
import { errorMessage, noopLogger, type RelayLogger } from "./logger.js"
import type { CallOutcome, ProviderAdapter, ProviderId } from "./types.js"

// --- Types ---

export type HealthStatus = "healthy" | "degraded" | "down"

export interface HealthRecord {
  status: HealthStatus
  consecutiveFailures: number
  lastSuccessAt: number | null
  lastCheckAt: number | null
  lastError?: string
}

export interface HealthMonitorConfig {
  probeIntervalMs: number      // Default: 30000
  probeTimeoutMs: number       // Default: 5000
  degradedThreshold: number    // K, default: 3
  downThreshold: number        // Default: 2K
}

export const DEFAULT_HEALTH_CONFIG: HealthMonitorConfig = {
  probeIntervalMs: 30_000,
  probeTimeoutMs: 5_000,
  degradedThreshold: 3,
  downThreshold: 6,
}

export interface HealthStatusChange {
  provider: ProviderId
  from: HealthStatus
  to: HealthStatus
}

/** Numeric encoding used by the health_status gauge */
export const HEALTH_STATUS_VALUE: Record<HealthStatus, number> = {
  healthy: 0,
  degraded: 1,
  down: 2,
}

// --- Monitor ---

export class ProviderHealthMonitor extends EventEmitter {
  private readonly records = new Map<ProviderId, HealthRecord>()
  private readonly config: HealthMonitorConfig
  private readonly clock: () => number
  private readonly log: RelayLogger
  private timer: ReturnType<typeof setInterval> | null = null
  private probing = false

  constructor(
    private readonly adapters: readonly ProviderAdapter[],
    config?: Partial<HealthMonitorConfig>,
    opts?: { clock?: () => number; logger?: RelayLogger },
  ) {
    super()
    this.config = { ...DEFAULT_HEALTH_CONFIG, ...config }
    if (this.config.downThreshold < this.config.degradedThreshold) {
      throw new Error(
        `downThreshold (${this.config.downThreshold}) must be >= degradedThreshold (${this.config.degradedThreshold})`,
      )
    }
    this.clock = opts?.clock ?? Date.now
    this.log = (opts?.logger ?? noopLogger).child("health")
    for (const adapter of adapters) {
      this.records.set(adapter.id, {
        status: "healthy",
        consecutiveFailures: 0,
        lastSuccessAt: null,
        lastCheckAt: null,
      })
    }
  }

  /** Start periodic probes. Idempotent. */
  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      void this.probeAll()
    }, this.config.probeIntervalMs)
    if (this.timer.unref) this.timer.unref()
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  /** Run one probe cycle. Overlapping cycles are skipped. */
  async probeAll(): Promise<void> {
    if (this.probing) return
    this.probing = true
    try {
      await Promise.allSettled(this.adapters.map((adapter) => this.probeOne(adapter)))
    } finally {
      this.probing = false
    }
  }

  /** Feed a real call outcome into the same counters as probes. */
  recordOutcome(outcome: CallOutcome): void {
    if (outcome.success) {
      this.markSuccess(outcome.provider)
    } else if (outcome.errorKind === undefined || countsAsFailure(outcome.errorKind)) {
      this.markFailure(outcome.provider, outcome.errorKind ?? "network")
    }
  }

  isAvailable(provider: ProviderId): boolean {
    const record = this.records.get(provider)
    return record !== undefined && record.status !== "down"
  }

  getRecord(provider: ProviderId): HealthRecord | undefined {
    const record = this.records.get(provider)
    return record ? { ...record } : undefined
  }

  /** Snapshot for external health endpoints */
  getHealth(): Partial<Record<ProviderId, HealthRecord>> {
    const out: Partial<Record<ProviderId, HealthRecord>> = {}
    for (const [provider, record] of this.records) {
      out[provider] = { ...record }
    }
    return out
  }

  // --- Private ---

  private async probeOne(adapter: ProviderAdapter): Promise<void> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.config.probeTimeoutMs)
    const start = this.clock()
    try {
      await adapter.probe(controller.signal)
      this.markSuccess(adapter.id)
    } catch (err) {
      const callError = toProviderCallError(adapter.id, err)
      // Probe failures stay here: recorded and logged, never thrown to callers
      this.log.warn("probe failed", {
        provider: adapter.id,
        kind: callError.kind,
        latency_ms: this.clock() - start,
        error: errorMessage(err),
      })
      if (countsAsFailure(callError.kind)) {
        this.markFailure(adapter.id, callError.kind, callError.message)
      }
    } finally {
      clearTimeout(timeout)
    }
  }

  private markSuccess(provider: ProviderId): void {
    const record = this.records.get(provider)
    if (!record) return
    const now = this.clock()
    record.consecutiveFailures = 0
    record.lastSuccessAt = now
    record.lastCheckAt = now
    record.lastError = undefined
    this.setStatus(provider, record, "healthy")
  }

  private markFailure(provider: ProviderId, kind: ProviderErrorKind, message?: string): void {
    const record = this.records.get(provider)
    if (!record) return
    record.consecutiveFailures++
    record.lastCheckAt = this.clock()
    record.lastError = message ?? kind

    if (record.consecutiveFailures >= this.config.downThreshold) {
      this.setStatus(provider, record, "down")
    } else if (record.consecutiveFailures >= this.config.degradedThreshold) {
      this.setStatus(provider, record, "degraded")
    }
  }

  private setStatus(provider: ProviderId, record: HealthRecord, next: HealthStatus): void {
    const from = record.status
    if (from === next) return
    record.status = next
    const change: HealthStatusChange = { provider, from, to: next }
    this.log.info("status changed", { ...change })
    this.emit("status", change)
  }
}
