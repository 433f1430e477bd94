// src/config.ts — Configuration loader from environment variables

import { DEFAULT_CIRCUIT_CONFIG, type CircuitBreakerConfig } from "./relay/circuit-breaker.js"
import { DEFAULT_CONTENT_RULES_PATH } from "./relay/content-filter.js"
import { DEFAULT_HEALTH_CONFIG, type HealthMonitorConfig } from "./relay/health.js"
import { isLogLevel, type LogLevel } from "./relay/logger.js"
import type { RateLimitConfig } from "./relay/rate-limiter.js"
import { DEFAULT_REDIS_CONFIG, type RedisConfig } from "./relay/redis/client.js"
import { DEFAULT_MAX_CONNECTIONS } from "./relay/registry.js"
import type { ResponseCacheConfig } from "./relay/response-cache.js"
import { DEFAULT_RETRY_POLICY, type RetryPolicyConfig } from "./relay/retry-policy.js"
import { DEFAULT_SETTINGS_INPUT, type SettingsInput } from "./relay/settings.js"
import { PROVIDER_IDS, isProviderId, type ProviderId, type ReasoningDepth } from "./relay/types.js"
import { AITUNNEL_BASE_URL, OPENROUTER_BASE_URL } from "./relay/providers/openai-compatible.js"

export interface ProviderCredentials {
  apiKey: string
  baseUrl: string
}

export interface SwitchboardConfig {
  // Gateway
  port: number
  host: string
  logLevel: LogLevel

  // Providers (only those with an API key are registered)
  providers: Partial<Record<ProviderId, ProviderCredentials>>
  openrouterAttribution: { referer: string; title: string }
  maxConnectionsPerProvider: number

  /** Seed for the settings store and the target of a settings reset */
  runtime: SettingsInput

  rateLimit: RateLimitConfig
  cache: ResponseCacheConfig
  circuit: CircuitBreakerConfig
  health: HealthMonitorConfig
  retry: RetryPolicyConfig
  contentRulesPath: string

  /** Cache mirror; null when REDIS_URL is unset */
  redis: RedisConfig | null

  auth: {
    /** Bearer token for the reply endpoint; empty leaves it open (dev mode) */
    apiToken: string
    /** Bearer token for settings endpoints; empty disables them */
    adminToken: string
    /** Bearer token for /metrics; empty leaves it open */
    metricsToken: string
  }
}

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(envKey: string, fallback: string): number {
  const raw = process.env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function parseFloatEnv(envKey: string, fallback: number): number {
  const raw = process.env[envKey]
  if (raw === undefined || raw === "") return fallback
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new Error(`${envKey} must be a number (got "${raw}")`)
  }
  return value
}

function parseBoolEnv(envKey: string, fallback: boolean): boolean {
  const raw = process.env[envKey]
  if (raw === undefined || raw === "") return fallback
  const v = raw.trim().toLowerCase()
  if (v === "true" || v === "1") return true
  if (v === "false" || v === "0") return false
  throw new Error(`${envKey} must be true or false (got "${raw}")`)
}

/** Comma-separated, order preserved; empty entries dropped. */
function parseListEnv(envKey: string, fallback: readonly string[]): string[] {
  const items = (process.env[envKey] ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
  return items.length > 0 ? items : [...fallback]
}

function parseProviderOrder(value: string | undefined): ProviderId[] {
  if (!value) return [...DEFAULT_SETTINGS_INPUT.providerOrder]
  const order = value
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean)
  const ids: ProviderId[] = []
  for (const name of order) {
    if (!isProviderId(name)) {
      throw new Error(`AI_PROVIDER_ORDER contains unknown provider "${name}" (known: ${PROVIDER_IDS.join(", ")})`)
    }
    ids.push(name)
  }
  return ids
}

const REASONING_DEPTHS: readonly ReasoningDepth[] = ["low", "medium", "high"]

function parseReasoningDepth(value: string | undefined): ReasoningDepth {
  const v = (value ?? DEFAULT_SETTINGS_INPUT.reasoning.depth).trim().toLowerCase()
  const depth = REASONING_DEPTHS.find((d) => d === v)
  if (!depth) throw new Error(`RUNTIME_REASONING_DEPTH must be one of ${REASONING_DEPTHS.join(", ")} (got "${value}")`)
  return depth
}

function parseLogLevel(value: string | undefined): LogLevel {
  const v = (value ?? "info").trim().toLowerCase()
  if (!isLogLevel(v)) throw new Error(`LOG_LEVEL must be one of debug, info, warn, error (got "${value}")`)
  return v
}

export function loadConfig(): SwitchboardConfig {
  const providers: Partial<Record<ProviderId, ProviderCredentials>> = {}
  if (process.env.OPENROUTER_API_KEY) {
    providers.openrouter = {
      apiKey: process.env.OPENROUTER_API_KEY,
      baseUrl: process.env.OPENROUTER_BASE_URL ?? OPENROUTER_BASE_URL,
    }
  }
  if (process.env.AITUNNEL_API_KEY) {
    providers.aitunnel = {
      apiKey: process.env.AITUNNEL_API_KEY,
      baseUrl: process.env.AITUNNEL_BASE_URL ?? AITUNNEL_BASE_URL,
    }
  }
  if (Object.keys(providers).length === 0) {
    throw new Error("At least one of OPENROUTER_API_KEY or AITUNNEL_API_KEY is required")
  }

  const d = DEFAULT_SETTINGS_INPUT
  // Drop unconfigured providers from the order so the store accepts it
  const providerOrder = parseProviderOrder(process.env.AI_PROVIDER_ORDER).filter((id) => providers[id] !== undefined)
  if (providerOrder.length === 0) {
    throw new Error("AI_PROVIDER_ORDER names no provider that has an API key")
  }

  const runtime: SettingsInput = {
    temperature: parseFloatEnv("RUNTIME_TEMPERATURE", d.temperature),
    topP: parseFloatEnv("RUNTIME_TOP_P", d.topP),
    maxTokens: {
      openrouter: parseIntEnv("RUNTIME_MAX_TOKENS_OR", String(d.maxTokens.openrouter)),
      aitunnel: parseIntEnv("RUNTIME_MAX_TOKENS_AT", String(d.maxTokens.aitunnel)),
    },
    models: {
      openrouter: parseListEnv("OPENROUTER_MODELS", d.models.openrouter),
      aitunnel: parseListEnv("AITUNNEL_MODELS", d.models.aitunnel),
    },
    modelMaxTokens: { ...d.modelMaxTokens },
    maxHistory: parseIntEnv("RUNTIME_MAX_HISTORY", String(d.maxHistory)),
    historyTokenBudget: parseIntEnv("RUNTIME_HISTORY_TOKEN_BUDGET", String(d.historyTokenBudget)),
    maxReplyChars: parseIntEnv("RUNTIME_MAX_AI_CHARS", String(d.maxReplyChars)),
    retryCount: {
      openrouter: parseIntEnv("RUNTIME_OR_RETRIES", String(d.retryCount.openrouter)),
      aitunnel: parseIntEnv("RUNTIME_AT_RETRIES", String(d.retryCount.aitunnel)),
    },
    // Seconds in the environment, milliseconds internally
    timeoutMs: {
      openrouter: parseIntEnv("RUNTIME_OR_TIMEOUT", String(d.timeoutMs.openrouter / 1000)) * 1000,
      aitunnel: parseIntEnv("RUNTIME_AT_TIMEOUT", String(d.timeoutMs.aitunnel / 1000)) * 1000,
    },
    providerOrder,
    fallbackEnabled: parseBoolEnv("RUNTIME_FALLBACK_ENABLED", d.fallbackEnabled),
    deadlineMs: parseIntEnv("RUNTIME_DEADLINE_MS", String(d.deadlineMs)),
    reasoning: {
      enabled: parseBoolEnv("RUNTIME_REASONING_ENABLED", d.reasoning.enabled),
      maxTokens: parseIntEnv("RUNTIME_REASONING_TOKENS", String(d.reasoning.maxTokens)),
      depth: parseReasoningDepth(process.env.RUNTIME_REASONING_DEPTH),
    },
  }

  const redisUrl = process.env.REDIS_URL

  return {
    port: parseIntEnv("PORT", "3000"),
    host: process.env.HOST ?? "0.0.0.0",
    logLevel: parseLogLevel(process.env.LOG_LEVEL),

    providers,
    openrouterAttribution: {
      referer: process.env.OPENROUTER_REFERER ?? "https://localhost",
      title: process.env.OPENROUTER_TITLE ?? "switchboard",
    },
    maxConnectionsPerProvider: parseIntEnv("PROVIDER_MAX_CONNECTIONS", String(DEFAULT_MAX_CONNECTIONS)),

    runtime,

    rateLimit: {
      perUser: {
        limit: parseIntEnv("RATE_LIMIT_USER_MAX", "10"),
        windowMs: parseIntEnv("RATE_LIMIT_USER_WINDOW_MS", "60000"),
      },
      perPeer: {
        limit: parseIntEnv("RATE_LIMIT_PEER_MAX", "30"),
        windowMs: parseIntEnv("RATE_LIMIT_PEER_WINDOW_MS", "60000"),
      },
    },
    cache: {
      ttlMs: parseIntEnv("CACHE_TTL_MS", "300000"),
      maxEntries: parseIntEnv("CACHE_MAX_ENTRIES", "1000"),
    },
    circuit: {
      ...DEFAULT_CIRCUIT_CONFIG,
      failureThreshold: parseIntEnv("CIRCUIT_FAILURE_THRESHOLD", String(DEFAULT_CIRCUIT_CONFIG.failureThreshold)),
      windowMs: parseIntEnv("CIRCUIT_WINDOW_MS", String(DEFAULT_CIRCUIT_CONFIG.windowMs)),
      cooldownMs: parseIntEnv("CIRCUIT_COOLDOWN_MS", String(DEFAULT_CIRCUIT_CONFIG.cooldownMs)),
    },
    health: {
      ...DEFAULT_HEALTH_CONFIG,
      probeIntervalMs: parseIntEnv("HEALTH_PROBE_INTERVAL_MS", String(DEFAULT_HEALTH_CONFIG.probeIntervalMs)),
      probeTimeoutMs: parseIntEnv("HEALTH_PROBE_TIMEOUT_MS", String(DEFAULT_HEALTH_CONFIG.probeTimeoutMs)),
    },
    retry: {
      ...DEFAULT_RETRY_POLICY,
      baseDelayMs: parseIntEnv("RETRY_BASE_DELAY_MS", String(DEFAULT_RETRY_POLICY.baseDelayMs)),
      maxDelayMs: parseIntEnv("RETRY_MAX_DELAY_MS", String(DEFAULT_RETRY_POLICY.maxDelayMs)),
    },
    contentRulesPath: process.env.CONTENT_RULES_PATH ?? DEFAULT_CONTENT_RULES_PATH,

    redis: redisUrl ? { ...DEFAULT_REDIS_CONFIG, url: redisUrl } : null,

    auth: {
      apiToken: process.env.SWITCHBOARD_API_TOKEN ?? "",
      adminToken: process.env.SWITCHBOARD_ADMIN_TOKEN ?? "",
      metricsToken: process.env.SWITCHBOARD_METRICS_TOKEN ?? "",
    },
  }
}
