// src/relay/types.ts — Relay shared types: providers, settings, requests, outcomes

import type { ProviderErrorKind } from "./errors.js"

// --- Providers ---

/** Closed set of backends. Tuple order is the default fallback sequence. */
export const PROVIDER_IDS = ["openrouter", "aitunnel"] as const

export type ProviderId = (typeof PROVIDER_IDS)[number]

/** Caller's provider preference: an explicit backend or automatic ordering */
export type ProviderPreference = ProviderId | "auto"

export function isProviderId(value: unknown): value is ProviderId {
  return typeof value === "string" && (PROVIDER_IDS as readonly string[]).includes(value)
}

// --- Runtime settings ---

export type ReasoningDepth = "low" | "medium" | "high"

export interface ReasoningSettings {
  enabled: boolean
  maxTokens: number
  depth: ReasoningDepth
}

/**
 * Immutable parameter snapshot. Replaced as a whole by SettingsStore;
 * every in-flight call keeps the snapshot it captured at entry.
 */
export interface RuntimeSettings {
  readonly version: number
  readonly temperature: number
  readonly topP: number
  readonly maxTokens: Readonly<Record<ProviderId, number>>
  /** Ordered per provider; the first model is tried first */
  readonly models: Readonly<Record<ProviderId, readonly string[]>>
  readonly modelMaxTokens: Readonly<Record<string, number>>
  readonly maxHistory: number
  readonly historyTokenBudget: number
  readonly maxReplyChars: number
  readonly retryCount: Readonly<Record<ProviderId, number>>
  readonly timeoutMs: Readonly<Record<ProviderId, number>>
  readonly providerOrder: readonly ProviderId[]
  readonly fallbackEnabled: boolean
  readonly deadlineMs: number
  readonly reasoning: Readonly<ReasoningSettings>
}

// --- Conversation ---

export type ChatRole = "system" | "user" | "assistant"

export interface ChatMessage {
  role: ChatRole
  text: string
  /** Epoch milliseconds */
  timestamp: number
}

// --- Completion capability ---

export interface CompletionMessage {
  role: ChatRole
  content: string
}

export interface CompletionRequest {
  model: string
  messages: CompletionMessage[]
  temperature: number
  topP: number
  maxTokens: number
  reasoning?: ReasoningSettings
}

export interface CompletionResult {
  text: string
  model: string
  usage?: { promptTokens: number; completionTokens: number }
}

/**
 * Provider capability. Adding a backend means implementing this interface
 * and registering it; the orchestrator never branches on identity.
 */
export interface ProviderAdapter {
  readonly id: ProviderId
  sendCompletion(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult>
  /** Minimal liveness check used by the health monitor */
  probe(signal: AbortSignal): Promise<void>
}

// --- Orchestrator I/O ---

export interface GenerateReplyRequest {
  callerId: string
  peerId: string
  systemPrompt: string
  history: readonly ChatMessage[]
  userText: string
  /** Captured snapshot; defaults to the store's current one at entry */
  settings?: RuntimeSettings
  providerPreference?: ProviderPreference
  /** External cancellation, combined with the settings deadline */
  signal?: AbortSignal
}

export interface ReplyMetadata {
  requestId: string
  providerUsed: ProviderId
  model: string
  latencyMs: number
  attemptCount: number
  cacheHit: boolean
  settingsVersion: number
  /** Notes from redaction rules applied to input or output */
  redactions: string[]
}

export interface ReplyResult {
  reply: string
  metadata: ReplyMetadata
}

/** Per-attempt record consumed by health, circuit and metrics */
export interface CallOutcome {
  provider: ProviderId
  success: boolean
  latencyMs: number
  errorKind?: ProviderErrorKind
}
