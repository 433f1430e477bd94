// src/relay/redis/client.ts — Redis port for the optional cache mirror
//
// The relay only depends on this interface; the ioredis-backed factory is
// injected at boot time. Redis unavailability is never fatal: the mirror
// fails open and the in-memory cache keeps serving.

export type RedisConnectionState = "connecting" | "connected" | "disconnected"

export interface RedisConfig {
  url: string                    // redis://localhost:6379
  keyPrefix: string              // Default: "switchboard:cache"
  connectTimeoutMs: number       // Default: 5000
  commandTimeoutMs: number       // Default: 1000
  maxRetriesPerRequest: number   // Default: 1 (fail fast)
}

export const DEFAULT_REDIS_CONFIG: Omit<RedisConfig, "url"> = {
  keyPrefix: "switchboard:cache",
  connectTimeoutMs: 5000,
  commandTimeoutMs: 1000,
  maxRetriesPerRequest: 1,
}

/** Minimal Redis command interface (subset of the ioredis API) */
export interface RedisCommandClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>
  del(...keys: string[]): Promise<number>
  quit(): Promise<string>
  on(event: string, handler: (...args: unknown[]) => void): unknown
}

export interface RedisClientFactory {
  createCommandClient(config: RedisConfig): RedisCommandClient
}

/** Tracks connection state from client events for health reporting. */
export class RedisConnection {
  private _state: RedisConnectionState = "connecting"

  constructor(readonly client: RedisCommandClient) {
    client.on("ready", () => {
      this._state = "connected"
    })
    client.on("close", () => {
      this._state = "disconnected"
    })
    client.on("reconnecting", () => {
      this._state = "connecting"
    })
  }

  get state(): RedisConnectionState {
    return this._state
  }

  async close(): Promise<void> {
    await this.client.quit()
    this._state = "disconnected"
  }
}
