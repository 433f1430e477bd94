// src/relay/registry.ts — Provider registry: adapter and connection pool per backend

import { ConnectionPool, type PoolStats } from "./connection-pool.js"
import { PROVIDER_IDS, type ProviderAdapter, type ProviderId } from "./types.js"

export interface ProviderEntry {
  adapter: ProviderAdapter
  pool: ConnectionPool
}

/** Default bound on concurrent in-flight requests per provider */
export const DEFAULT_MAX_CONNECTIONS = 8

export class ProviderRegistry {
  private readonly entries = new Map<ProviderId, ProviderEntry>()

  constructor(private readonly maxConnections: number = DEFAULT_MAX_CONNECTIONS) {}

  register(adapter: ProviderAdapter): this {
    if (this.entries.has(adapter.id)) {
      throw new Error(`Provider "${adapter.id}" is already registered`)
    }
    this.entries.set(adapter.id, {
      adapter,
      pool: new ConnectionPool(adapter.id, this.maxConnections),
    })
    return this
  }

  get(id: ProviderId): ProviderEntry | undefined {
    return this.entries.get(id)
  }

  has(id: ProviderId): boolean {
    return this.entries.has(id)
  }

  /** Registered providers in canonical order */
  ids(): ProviderId[] {
    return PROVIDER_IDS.filter((id) => this.entries.has(id))
  }

  adapters(): ProviderAdapter[] {
    return this.ids().flatMap((id) => {
      const entry = this.entries.get(id)
      return entry ? [entry.adapter] : []
    })
  }

  poolStats(): Partial<Record<ProviderId, PoolStats>> {
    const out: Partial<Record<ProviderId, PoolStats>> = {}
    for (const [id, entry] of this.entries) out[id] = entry.pool.stats()
    return out
  }
}
