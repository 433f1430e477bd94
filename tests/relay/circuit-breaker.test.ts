// tests/relay/circuit-breaker.test.ts — Per-provider circuit breaker state machine

import { describe, it, expect, beforeEach } from "vitest"
import {
  CircuitBreaker,
  CircuitBreakerSet,
  type CircuitTransition,
} from "../../src/relay/circuit-breaker.js"

describe("CircuitBreaker", () => {
  let now: number
  let cb: CircuitBreaker

  beforeEach(() => {
    now = 1_000
    cb = new CircuitBreaker(
      "openrouter",
      { failureThreshold: 3, windowMs: 10_000, cooldownMs: 5_000, cooldownMultiplier: 2, maxCooldownMs: 12_000 },
      () => now,
    )
  })

  function fail(times: number) {
    for (let i = 0; i < times; i++) {
      const permit = cb.tryAcquire()
      expect(permit).not.toBeNull()
      if (permit) cb.recordFailure(permit)
      now += 100
    }
  }

  it("starts closed and allows calls", () => {
    expect(cb.snapshot().phase).toBe("closed")
    expect(cb.canAttempt()).toBe(true)
    expect(cb.tryAcquire()).toEqual({ provider: "openrouter", trial: false })
  })

  it("opens after F failures within the window", () => {
    fail(2)
    expect(cb.snapshot().phase).toBe("closed")
    expect(cb.snapshot().failuresInWindow).toBe(2)
    fail(1)
    expect(cb.snapshot().phase).toBe("open")
    expect(cb.snapshot().openedAt).toBe(1_200)
  })

  it("does not open when failures are spread wider than the window", () => {
    fail(2)
    now += 10_000
    fail(1)
    expect(cb.snapshot().phase).toBe("closed")
    expect(cb.snapshot().failuresInWindow).toBe(1)
  })

  it("success in closed state clears the failure window", () => {
    fail(2)
    const permit = cb.tryAcquire()
    if (permit) cb.recordSuccess(permit)
    expect(cb.snapshot().failuresInWindow).toBe(0)
    fail(2)
    expect(cb.snapshot().phase).toBe("closed")
  })

  it("refuses every call until the cool-down elapses", () => {
    fail(3)
    const openedAt = cb.snapshot().openedAt ?? 0
    now = openedAt + 4_999
    expect(cb.canAttempt()).toBe(false)
    expect(cb.tryAcquire()).toBeNull()
    expect(cb.snapshot().phase).toBe("open")

    now = openedAt + 5_000
    expect(cb.canAttempt()).toBe(true)
    expect(cb.tryAcquire()).toEqual({ provider: "openrouter", trial: true })
    expect(cb.snapshot().phase).toBe("half_open")
  })

  it("hands out exactly one trial permit in half_open", () => {
    fail(3)
    now += 5_000
    const permits = Array.from({ length: 5 }, () => cb.tryAcquire())
    expect(permits.filter((p) => p !== null)).toHaveLength(1)
    expect(cb.canAttempt()).toBe(false)
    expect(cb.snapshot().trialInFlight).toBe(true)
  })

  it("closes after a successful trial and resets the cool-down", () => {
    fail(3)
    now += 5_000
    const trial = cb.tryAcquire()
    expect(trial?.trial).toBe(true)
    if (trial) cb.recordSuccess(trial)
    const snap = cb.snapshot()
    expect(snap.phase).toBe("closed")
    expect(snap.openedAt).toBeNull()
    expect(snap.cooldownMs).toBe(5_000)
  })

  it("reopens after a failed trial with a longer, capped cool-down", () => {
    fail(3)
    now += 5_000
    let trial = cb.tryAcquire()
    if (trial) cb.recordFailure(trial)
    expect(cb.snapshot().phase).toBe("open")
    expect(cb.snapshot().cooldownMs).toBe(10_000)

    now += 10_000
    trial = cb.tryAcquire()
    if (trial) cb.recordFailure(trial)
    expect(cb.snapshot().cooldownMs).toBe(12_000)
  })

  it("release frees the trial slot without a transition", () => {
    fail(3)
    now += 5_000
    const trial = cb.tryAcquire()
    if (trial) cb.release(trial)
    expect(cb.snapshot().phase).toBe("half_open")
    expect(cb.snapshot().trialInFlight).toBe(false)
    expect(cb.tryAcquire()?.trial).toBe(true)
  })

  it("emits transition events", () => {
    const events: CircuitTransition[] = []
    cb.on("transition", (e: CircuitTransition) => events.push(e))
    fail(3)
    now += 5_000
    const trial = cb.tryAcquire()
    if (trial) cb.recordSuccess(trial)
    expect(events).toEqual([
      { provider: "openrouter", from: "closed", to: "open" },
      { provider: "openrouter", from: "open", to: "half_open" },
      { provider: "openrouter", from: "half_open", to: "closed" },
    ])
  })

  it("reset returns to closed", () => {
    fail(3)
    cb.reset()
    expect(cb.snapshot().phase).toBe("closed")
    expect(cb.canAttempt()).toBe(true)
  })
})

describe("CircuitBreakerSet", () => {
  it("keeps providers independent", () => {
    const now = 0
    const set = new CircuitBreakerSet(["openrouter", "aitunnel"], { failureThreshold: 1 }, () => now)
    const permit = set.get("openrouter").tryAcquire()
    if (permit) set.get("openrouter").recordFailure(permit)

    expect(set.get("openrouter").snapshot().phase).toBe("open")
    expect(set.get("aitunnel").snapshot().phase).toBe("closed")
    expect(set.snapshot().map((s) => s.phase)).toEqual(["open", "closed"])
  })

  it("throws for an unregistered provider", () => {
    const set = new CircuitBreakerSet(["openrouter"])
    expect(() => set.get("aitunnel")).toThrow(/No circuit breaker/)
  })
})
