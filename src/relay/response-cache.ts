// src/relay/response-cache.ts — Reply cache with TTL expiry and LRU eviction
//
// TTL decides logical expiry, LRU decides physical capacity. Reads and writes
// refresh recency. Implementation: doubly-linked list + Map for O(1) get/set/evict.

import { createHash } from "node:crypto"
import { errorMessage, noopLogger, type RelayLogger } from "./logger.js"
import type { ChatMessage, ProviderId, ProviderPreference, RuntimeSettings } from "./types.js"

// --- Fingerprint ---

/** Recursively sort object keys so serialization is order independent. */
function canonicalize(value: unknown): unknown {
  if (value === null || typeof value !== "object") return value
  if (Array.isArray(value)) return value.map(canonicalize)
  const sorted: Record<string, unknown> = {}
  for (const [key, inner] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[key] = canonicalize(inner)
  }
  return sorted
}

export interface FingerprintInput {
  preference: ProviderPreference
  systemPrompt: string
  history: readonly ChatMessage[]
  userText: string
  settings: RuntimeSettings
}

/**
 * Deterministic request identity. Covers everything that shapes the reply:
 * provider preference and models, prompt, summarized history (role + text,
 * not timestamps), user text and the generation parameters. Settings fields
 * that only steer retries (timeouts, retry counts) are left out.
 */
export function fingerprint(input: FingerprintInput): string {
  const { settings } = input
  const models =
    input.preference === "auto"
      ? settings.models
      : { [input.preference]: settings.models[input.preference] }
  const payload = canonicalize({
    preference: input.preference,
    models,
    systemPrompt: input.systemPrompt,
    history: input.history.map((m) => [m.role, m.text]),
    userText: input.userText,
    temperature: settings.temperature,
    topP: settings.topP,
    maxTokens: settings.maxTokens,
    maxReplyChars: settings.maxReplyChars,
    reasoning: settings.reasoning,
  })
  return createHash("sha256").update(JSON.stringify(payload)).digest("hex")
}

// --- Entries ---

export interface CacheEntry {
  readonly fingerprint: string
  readonly reply: string
  readonly provider: ProviderId
  readonly model: string
  readonly createdAt: number
  readonly expiresAt: number
  /** Time of the read or write that produced this copy */
  readonly lastAccessAt: number
}

export interface CacheStats {
  size: number
  hits: number
  misses: number
  evictions: number
  expirations: number
}

/**
 * Optional external durability. Writes go through asynchronously;
 * memory misses consult the mirror and promote what it returns.
 */
export interface CacheMirror {
  get(fingerprint: string): Promise<CacheEntry | null>
  set(entry: CacheEntry, ttlMs: number): Promise<void>
  delete(fingerprint: string): Promise<void>
}

export interface ResponseCacheConfig {
  ttlMs: number         // Default: 300_000 (5 min)
  maxEntries: number    // Default: 1000
}

export const DEFAULT_CACHE_CONFIG: ResponseCacheConfig = {
  ttlMs: 300_000,
  maxEntries: 1000,
}

interface LRUNode {
  entry: CacheEntry
  prev: LRUNode | null
  next: LRUNode | null
}

// --- Cache ---

export class ResponseCache {
  private readonly map = new Map<string, LRUNode>()
  private head: LRUNode | null = null  // most recently used
  private tail: LRUNode | null = null  // least recently used
  private readonly config: ResponseCacheConfig
  private readonly clock: () => number
  private readonly mirror?: CacheMirror
  private readonly log: RelayLogger
  private counters = { hits: 0, misses: 0, evictions: 0, expirations: 0 }

  constructor(
    config?: Partial<ResponseCacheConfig>,
    opts?: { clock?: () => number; mirror?: CacheMirror; logger?: RelayLogger },
  ) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config }
    if (this.config.maxEntries < 1 || this.config.ttlMs <= 0) {
      throw new Error(`Invalid cache config: maxEntries=${this.config.maxEntries}, ttlMs=${this.config.ttlMs}`)
    }
    this.clock = opts?.clock ?? Date.now
    this.mirror = opts?.mirror
    this.log = (opts?.logger ?? noopLogger).child("cache")
  }

  /**
   * Memory lookup. An expired entry is a miss and is evicted. A hit swaps in
   * a copy stamped with the access time; stored entries are never mutated.
   */
  get(key: string): CacheEntry | null {
    const node = this.map.get(key)
    if (!node) {
      this.counters.misses++
      return null
    }
    const now = this.clock()
    if (now >= node.entry.expiresAt) {
      this.unlink(node)
      this.counters.expirations++
      this.counters.misses++
      return null
    }
    node.entry = { ...node.entry, lastAccessAt: now }
    this.moveToHead(node)
    this.counters.hits++
    return node.entry
  }

  /** Live memory entry, leaving counters and recency untouched. */
  peek(key: string): CacheEntry | null {
    const node = this.map.get(key)
    return node && this.clock() < node.entry.expiresAt ? node.entry : null
  }

  /** Memory lookup, then the mirror (if configured) on a miss. */
  async lookup(key: string): Promise<CacheEntry | null> {
    const hit = this.get(key)
    if (hit || !this.mirror) return hit
    try {
      const mirrored = await this.mirror.get(key)
      const now = this.clock()
      if (!mirrored || now >= mirrored.expiresAt) return null
      const promoted: CacheEntry = { ...mirrored, lastAccessAt: now }
      this.insert(promoted)
      return promoted
    } catch (err) {
      this.log.warn("mirror read failed", { fingerprint: key, error: errorMessage(err) })
      return null
    }
  }

  /** Write a reply. Last writer wins; the entry itself is never mutated. */
  set(key: string, value: { reply: string; provider: ProviderId; model: string }): CacheEntry {
    const now = this.clock()
    const entry: CacheEntry = {
      fingerprint: key,
      reply: value.reply,
      provider: value.provider,
      model: value.model,
      createdAt: now,
      expiresAt: now + this.config.ttlMs,
      lastAccessAt: now,
    }
    this.insert(entry)
    if (this.mirror) {
      this.mirror.set(entry, this.config.ttlMs).catch((err: unknown) => {
        this.log.warn("mirror write failed", { fingerprint: key, error: errorMessage(err) })
      })
    }
    return entry
  }

  delete(key: string): boolean {
    const node = this.map.get(key)
    if (node) this.unlink(node)
    if (this.mirror) {
      this.mirror.delete(key).catch((err: unknown) => {
        this.log.warn("mirror delete failed", { fingerprint: key, error: errorMessage(err) })
      })
    }
    return node !== undefined
  }

  /** Remaining lifetime in ms, or null when absent/expired. Does not touch recency. */
  ttlRemaining(key: string): number | null {
    const node = this.map.get(key)
    if (!node) return null
    const left = node.entry.expiresAt - this.clock()
    return left > 0 ? left : null
  }

  /** Evict every expired entry. Returns the number removed. */
  purgeExpired(): number {
    const now = this.clock()
    let removed = 0
    let current = this.tail
    while (current) {
      const prev = current.prev
      if (now >= current.entry.expiresAt) {
        this.unlink(current)
        removed++
      }
      current = prev
    }
    this.counters.expirations += removed
    return removed
  }

  clear(): void {
    this.map.clear()
    this.head = null
    this.tail = null
  }

  stats(): CacheStats {
    return { size: this.map.size, ...this.counters }
  }

  get size(): number {
    return this.map.size
  }

  // --- Linked list operations ---

  private insert(entry: CacheEntry): void {
    const existing = this.map.get(entry.fingerprint)
    if (existing) this.unlink(existing)

    while (this.map.size >= this.config.maxEntries && this.tail) {
      this.unlink(this.tail)
      this.counters.evictions++
    }

    const node: LRUNode = { entry, prev: null, next: null }
    this.addToHead(node)
    this.map.set(entry.fingerprint, node)
  }

  private unlink(node: LRUNode): void {
    this.removeNode(node)
    this.map.delete(node.entry.fingerprint)
  }

  private addToHead(node: LRUNode): void {
    node.prev = null
    node.next = this.head
    if (this.head) this.head.prev = node
    this.head = node
    if (!this.tail) this.tail = node
  }

  private removeNode(node: LRUNode): void {
    if (node.prev) node.prev.next = node.next
    else this.head = node.next

    if (node.next) node.next.prev = node.prev
    else this.tail = node.prev

    node.prev = null
    node.next = null
  }

  private moveToHead(node: LRUNode): void {
    if (node === this.head) return
    this.removeNode(node)
    this.addToHead(node)
  }
}
