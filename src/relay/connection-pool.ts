// src/relay/connection-pool.ts — Per-provider connection slot pool
//
// Bounds concurrent in-flight requests to one provider. Callers beyond the
// limit queue FIFO and give up after their wait timeout.

export interface PoolStats {
  active: number
  waiting: number
  maxConnections: number
}

interface Waiter {
  resolve: (release: () => void) => void
  timer: ReturnType<typeof setTimeout>
}

export class PoolExhaustedError extends Error {
  readonly name = "PoolExhaustedError"

  constructor(pool: string, waitedMs: number) {
    super(`Connection pool "${pool}" exhausted after waiting ${waitedMs}ms`)
  }
}

export class ConnectionPool {
  private active = 0
  private readonly waiters: Waiter[] = []

  constructor(
    readonly name: string,
    readonly maxConnections: number,
  ) {
    if (maxConnections < 1) {
      throw new Error(`maxConnections must be >= 1 (got ${maxConnections})`)
    }
  }

  /**
   * Take a slot, waiting up to `timeoutMs`. Resolves with a release function
   * that must be called exactly once; extra calls are ignored.
   */
  acquire(timeoutMs: number): Promise<() => void> {
    if (this.active < this.maxConnections) {
      this.active++
      return Promise.resolve(this.releaser())
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const idx = this.waiters.indexOf(waiter)
          if (idx !== -1) this.waiters.splice(idx, 1)
          reject(new PoolExhaustedError(this.name, timeoutMs))
        }, timeoutMs),
      }
      this.waiters.push(waiter)
    })
  }

  stats(): PoolStats {
    return { active: this.active, waiting: this.waiters.length, maxConnections: this.maxConnections }
  }

  private releaser(): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.waiters.shift()
      if (next) {
        // Hand the slot straight to the next waiter; active count unchanged
        clearTimeout(next.timer)
        next.resolve(this.releaser())
      } else {
        this.active = Math.max(0, this.active - 1)
      }
    }
  }
}
