// tests/relay/health.test.ts — Provider health monitor

import { describe, it, expect, vi, afterEach } from "vitest"
import { ProviderHealthMonitor, type HealthStatusChange } from "../../src/relay/health.js"
import { ProviderCallError } from "../../src/relay/errors.js"
import type { ProviderAdapter, ProviderId } from "../../src/relay/types.js"

function adapter(id: ProviderId, probe: (signal: AbortSignal) => Promise<void>): ProviderAdapter {
  return {
    id,
    probe,
    sendCompletion: async () => ({ text: "unused", model: "m" }),
  }
}

const failing = () => Promise.reject(new ProviderCallError({ provider: "openrouter", kind: "server", message: "HTTP 502" }))

describe("ProviderHealthMonitor", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("starts every provider healthy", () => {
    const monitor = new ProviderHealthMonitor([adapter("openrouter", async () => {})])
    expect(monitor.getRecord("openrouter")).toEqual({
      status: "healthy",
      consecutiveFailures: 0,
      lastSuccessAt: null,
      lastCheckAt: null,
    })
    expect(monitor.isAvailable("openrouter")).toBe(true)
    expect(monitor.isAvailable("aitunnel")).toBe(false)
  })

  it("degrades at K consecutive failures and goes down at the down threshold", () => {
    const monitor = new ProviderHealthMonitor([adapter("openrouter", async () => {})], {
      degradedThreshold: 2,
      downThreshold: 4,
    })
    const fail = () => monitor.recordOutcome({ provider: "openrouter", success: false, latencyMs: 5, errorKind: "timeout" })

    fail()
    expect(monitor.getRecord("openrouter")?.status).toBe("healthy")
    fail()
    expect(monitor.getRecord("openrouter")?.status).toBe("degraded")
    expect(monitor.isAvailable("openrouter")).toBe(true)
    fail()
    fail()
    expect(monitor.getRecord("openrouter")?.status).toBe("down")
    expect(monitor.isAvailable("openrouter")).toBe(false)
  })

  it("any success restores healthy immediately", () => {
    let now = 100
    const monitor = new ProviderHealthMonitor(
      [adapter("openrouter", async () => {})],
      { degradedThreshold: 1, downThreshold: 2 },
      { clock: () => now },
    )
    monitor.recordOutcome({ provider: "openrouter", success: false, latencyMs: 1, errorKind: "network" })
    monitor.recordOutcome({ provider: "openrouter", success: false, latencyMs: 1, errorKind: "network" })
    expect(monitor.getRecord("openrouter")?.status).toBe("down")

    now = 250
    monitor.recordOutcome({ provider: "openrouter", success: true, latencyMs: 1 })
    expect(monitor.getRecord("openrouter")).toEqual({
      status: "healthy",
      consecutiveFailures: 0,
      lastSuccessAt: 250,
      lastCheckAt: 250,
      lastError: undefined,
    })
  })

  it("ignores client errors", () => {
    const monitor = new ProviderHealthMonitor([adapter("openrouter", async () => {})], { degradedThreshold: 1, downThreshold: 1 })
    monitor.recordOutcome({ provider: "openrouter", success: false, latencyMs: 1, errorKind: "client" })
    monitor.recordOutcome({ provider: "openrouter", success: false, latencyMs: 1, errorKind: "rate_limited" })
    expect(monitor.getRecord("openrouter")?.consecutiveFailures).toBe(0)
  })

  it("probe failures are recorded, never thrown", async () => {
    const monitor = new ProviderHealthMonitor(
      [adapter("openrouter", failing), adapter("aitunnel", async () => {})],
      { degradedThreshold: 1, downThreshold: 3 },
    )
    await expect(monitor.probeAll()).resolves.toBeUndefined()
    expect(monitor.getRecord("openrouter")?.status).toBe("degraded")
    expect(monitor.getRecord("openrouter")?.lastError).toBe("[openrouter] server: HTTP 502")
    expect(monitor.getRecord("aitunnel")?.status).toBe("healthy")
  })

  it("aborts a probe that exceeds the probe timeout", async () => {
    const hanging = (signal: AbortSignal) =>
      new Promise<void>((_, reject) => {
        signal.addEventListener("abort", () => {
          const err = new Error("aborted")
          err.name = "AbortError"
          reject(err)
        })
      })
    const monitor = new ProviderHealthMonitor([adapter("openrouter", hanging)], {
      probeTimeoutMs: 20,
      degradedThreshold: 1,
      downThreshold: 2,
    })
    await monitor.probeAll()
    expect(monitor.getRecord("openrouter")?.consecutiveFailures).toBe(1)
    expect(monitor.getRecord("openrouter")?.lastError).toBe("[openrouter] timeout: request aborted")
  })

  it("skips overlapping probe cycles", async () => {
    let calls = 0
    let finish: () => void = () => {}
    const slow = () =>
      new Promise<void>((resolve) => {
        calls++
        finish = resolve
      })
    const monitor = new ProviderHealthMonitor([adapter("openrouter", slow)], { probeTimeoutMs: 1_000 })
    const first = monitor.probeAll()
    await monitor.probeAll()
    expect(calls).toBe(1)
    finish()
    await first
  })

  it("emits status events on change", () => {
    const monitor = new ProviderHealthMonitor([adapter("aitunnel", async () => {})], {
      degradedThreshold: 1,
      downThreshold: 2,
    })
    const events: HealthStatusChange[] = []
    monitor.on("status", (e: HealthStatusChange) => events.push(e))
    monitor.recordOutcome({ provider: "aitunnel", success: false, latencyMs: 1, errorKind: "server" })
    monitor.recordOutcome({ provider: "aitunnel", success: false, latencyMs: 1, errorKind: "server" })
    monitor.recordOutcome({ provider: "aitunnel", success: true, latencyMs: 1 })
    expect(events).toEqual([
      { provider: "aitunnel", from: "healthy", to: "degraded" },
      { provider: "aitunnel", from: "degraded", to: "down" },
      { provider: "aitunnel", from: "down", to: "healthy" },
    ])
  })

  it("runs probes on the interval until stopped", async () => {
    vi.useFakeTimers()
    const probe = vi.fn(async () => {})
    const monitor = new ProviderHealthMonitor([adapter("openrouter", probe)], { probeIntervalMs: 1_000 })
    monitor.start()
    await vi.advanceTimersByTimeAsync(3_000)
    expect(probe).toHaveBeenCalledTimes(3)
    monitor.stop()
    await vi.advanceTimersByTimeAsync(3_000)
    expect(probe).toHaveBeenCalledTimes(3)
  })

  it("rejects a down threshold below the degraded threshold", () => {
    expect(() => new ProviderHealthMonitor([], { degradedThreshold: 3, downThreshold: 2 })).toThrow(/downThreshold/)
  })
})
