// src/relay/single-flight.ts — In-flight request deduplication
//
// The first caller for a key runs the work; callers arriving before it
// settles await the same promise and observe exactly its result or error.
// The work runs under a flight-owned signal that aborts only once every
// participant has cancelled; one caller leaving never cancels the others.

/** Rejection seen by a caller whose own signal aborted while it waited. */
export class FlightCancelledError extends Error {
  constructor(readonly key: string) {
    super(`caller cancelled while waiting on ${key}`)
    this.name = "FlightCancelledError"
  }
}

interface Flight<T> {
  promise: Promise<T>
  controller: AbortController
  /** Participants that have not cancelled */
  waiting: number
}

export class SingleFlight<T> {
  private readonly inflight = new Map<string, Flight<T>>()

  /**
   * Run `fn` for `key` unless a call for the same key is already in flight.
   * `joined` tells the caller whether it shared someone else's work. When
   * `signal` aborts, this caller alone rejects with FlightCancelledError.
   */
  do(
    key: string,
    fn: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): { promise: Promise<T>; joined: boolean } {
    if (signal?.aborted) {
      return { promise: Promise.reject(new FlightCancelledError(key)), joined: false }
    }

    const existing = this.inflight.get(key)
    const flight = existing ?? this.start(key, fn)
    flight.waiting++
    return { promise: signal ? this.follow(key, flight, signal) : flight.promise, joined: existing !== undefined }
  }

  has(key: string): boolean {
    return this.inflight.has(key)
  }

  get size(): number {
    return this.inflight.size
  }

  private start(key: string, fn: (signal: AbortSignal) => Promise<T>): Flight<T> {
    const controller = new AbortController()
    let work: Promise<T>
    try {
      work = fn(controller.signal)
    } catch (err) {
      work = Promise.reject(err)
    }
    const flight: Flight<T> = {
      controller,
      waiting: 0,
      promise: work.finally(() => {
        if (this.inflight.get(key) === flight) this.inflight.delete(key)
      }),
    }
    this.inflight.set(key, flight)
    return flight
  }

  private follow(key: string, flight: Flight<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        reject(new FlightCancelledError(key))
        flight.waiting--
        if (flight.waiting > 0) return
        // Nobody is left to observe the result; later callers start fresh
        if (this.inflight.get(key) === flight) this.inflight.delete(key)
        flight.controller.abort()
      }
      signal.addEventListener("abort", onAbort, { once: true })
      flight.promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort)
          resolve(value)
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort)
          reject(err)
        },
      )
    })
  }
}
