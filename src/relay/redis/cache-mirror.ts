// src/relay/redis/cache-mirror.ts — Redis write-through mirror for ResponseCache

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { CacheEntry, CacheMirror } from "../response-cache.js"
import type { RedisCommandClient } from "./client.js"

const StoredEntrySchema = Type.Object({
  fingerprint: Type.String(),
  reply: Type.String(),
  provider: Type.Union([Type.Literal("openrouter"), Type.Literal("aitunnel")]),
  model: Type.String(),
  createdAt: Type.Number(),
  expiresAt: Type.Number(),
  lastAccessAt: Type.Number(),
})

export class RedisCacheMirror implements CacheMirror {
  constructor(
    private readonly client: RedisCommandClient,
    private readonly keyPrefix: string,
  ) {}

  /** Stored entries that fail validation are treated as absent. */
  async get(fingerprint: string): Promise<CacheEntry | null> {
    const raw = await this.client.get(this.key(fingerprint))
    if (raw === null) return null
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      return null
    }
    return Value.Check(StoredEntrySchema, parsed) ? parsed : null
  }

  async set(entry: CacheEntry, ttlMs: number): Promise<void> {
    await this.client.set(this.key(entry.fingerprint), JSON.stringify(entry), "PX", ttlMs)
  }

  async delete(fingerprint: string): Promise<void> {
    await this.client.del(this.key(fingerprint))
  }

  private key(fingerprint: string): string {
    return `${this.keyPrefix}:${fingerprint}`
  }
}
