// tests/relay/connection-pool.test.ts — Bounded per-provider slots

import { afterEach, describe, it, expect, vi } from "vitest"
import { ConnectionPool, PoolExhaustedError } from "../../src/relay/connection-pool.js"

describe("ConnectionPool", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("hands out slots up to the limit", async () => {
    const pool = new ConnectionPool("openrouter", 2)
    await pool.acquire(100)
    await pool.acquire(100)
    expect(pool.stats()).toEqual({ active: 2, waiting: 0, maxConnections: 2 })
  })

  it("passes a released slot to the oldest waiter", async () => {
    const pool = new ConnectionPool("openrouter", 1)
    const release = await pool.acquire(100)
    const order: string[] = []
    const first = pool.acquire(1_000).then((r) => {
      order.push("first")
      return r
    })
    const second = pool.acquire(1_000).then((r) => {
      order.push("second")
      return r
    })
    expect(pool.stats().waiting).toBe(2)

    release()
    const releaseFirst = await first
    expect(order).toEqual(["first"])
    expect(pool.stats()).toEqual({ active: 1, waiting: 1, maxConnections: 1 })

    releaseFirst()
    const releaseSecond = await second
    releaseSecond()
    expect(order).toEqual(["first", "second"])
    expect(pool.stats()).toEqual({ active: 0, waiting: 0, maxConnections: 1 })
  })

  it("ignores repeated releases", async () => {
    const pool = new ConnectionPool("openrouter", 2)
    const release = await pool.acquire(100)
    await pool.acquire(100)
    release()
    release()
    expect(pool.stats().active).toBe(1)
  })

  it("rejects a waiter after its timeout", async () => {
    vi.useFakeTimers()
    const pool = new ConnectionPool("aitunnel", 1)
    await pool.acquire(100)
    const waiting = pool.acquire(250)
    const assertion = expect(waiting).rejects.toBeInstanceOf(PoolExhaustedError)
    await vi.advanceTimersByTimeAsync(250)
    await assertion
    await expect(waiting).rejects.toThrow('Connection pool "aitunnel" exhausted after waiting 250ms')
    expect(pool.stats().waiting).toBe(0)
  })

  it("requires at least one connection", () => {
    expect(() => new ConnectionPool("x", 0)).toThrow(/maxConnections/)
  })
})
