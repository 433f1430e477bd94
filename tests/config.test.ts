// tests/config.test.ts — Environment configuration loader

import { afterEach, beforeEach, describe, it, expect } from "vitest"
import { loadConfig } from "../src/config.js"

const MANAGED = /^(OPENROUTER_|AITUNNEL_|AI_PROVIDER_ORDER|RUNTIME_|RATE_LIMIT_|CACHE_|CIRCUIT_|HEALTH_PROBE_|RETRY_|PROVIDER_MAX_|SWITCHBOARD_|REDIS_URL|CONTENT_RULES_PATH|PORT$|HOST$|LOG_LEVEL$)/

describe("loadConfig", () => {
  const savedEnv = { ...process.env }

  function restoreEnv() {
    for (const key of Object.keys(process.env)) {
      if (!(key in savedEnv)) delete process.env[key]
    }
    Object.assign(process.env, savedEnv)
  }

  beforeEach(() => {
    for (const key of Object.keys(process.env)) {
      if (MANAGED.test(key)) delete process.env[key]
    }
  })

  afterEach(restoreEnv)

  it("requires at least one provider key", () => {
    expect(() => loadConfig()).toThrow("At least one of OPENROUTER_API_KEY or AITUNNEL_API_KEY is required")
  })

  it("registers only providers with a key and applies defaults", () => {
    process.env.OPENROUTER_API_KEY = "test-secret"
    const config = loadConfig()

    expect(config.providers).toEqual({
      openrouter: { apiKey: "test-secret", baseUrl: "https://openrouter.ai/api/v1" },
    })
    expect(config.runtime.providerOrder).toEqual(["openrouter"])
    expect(config.runtime.timeoutMs).toEqual({ openrouter: 60_000, aitunnel: 60_000 })
    expect(config.runtime.maxReplyChars).toBe(380)
    expect(config.port).toBe(3000)
    expect(config.host).toBe("0.0.0.0")
    expect(config.logLevel).toBe("info")
    expect(config.redis).toBeNull()
    expect(config.auth).toEqual({ apiToken: "", adminToken: "", metricsToken: "" })
    expect(config.contentRulesPath).toBe("config/content-rules.json")
  })

  it("reads runtime overrides, with timeouts given in seconds", () => {
    process.env.AITUNNEL_API_KEY = "test-secret"
    process.env.RUNTIME_AT_TIMEOUT = "15"
    process.env.RUNTIME_TEMPERATURE = "0.9"
    process.env.RUNTIME_FALLBACK_ENABLED = "false"
    process.env.RUNTIME_REASONING_ENABLED = "1"
    process.env.RUNTIME_REASONING_DEPTH = "HIGH"
    const { runtime } = loadConfig()

    expect(runtime.timeoutMs.aitunnel).toBe(15_000)
    expect(runtime.temperature).toBe(0.9)
    expect(runtime.fallbackEnabled).toBe(false)
    expect(runtime.reasoning).toEqual({ enabled: true, maxTokens: 100, depth: "high" })
  })

  it("reads ordered model lists per provider", () => {
    process.env.AITUNNEL_API_KEY = "test-secret"
    process.env.AITUNNEL_MODELS = " fast-model, ,slow-model "
    const { runtime } = loadConfig()

    expect(runtime.models).toEqual({
      openrouter: ["deepseek/deepseek-chat-v3-0324:free"],
      aitunnel: ["fast-model", "slow-model"],
    })
    expect(runtime.modelMaxTokens).toEqual({ "gpt-5-nano": 200 })
  })

  it("honours the provider order and drops providers without a key", () => {
    process.env.OPENROUTER_API_KEY = "test-secret"
    process.env.AITUNNEL_API_KEY = "test-secret"
    process.env.AI_PROVIDER_ORDER = "aitunnel, openrouter"
    expect(loadConfig().runtime.providerOrder).toEqual(["aitunnel", "openrouter"])

    delete process.env.OPENROUTER_API_KEY
    expect(loadConfig().runtime.providerOrder).toEqual(["aitunnel"])
  })

  it("rejects an unknown provider name in the order", () => {
    process.env.OPENROUTER_API_KEY = "test-secret"
    process.env.AI_PROVIDER_ORDER = "openrouter,mistral"
    expect(() => loadConfig()).toThrow(/unknown provider "mistral"/)
  })

  it("fails fast on malformed numbers and flags", () => {
    process.env.OPENROUTER_API_KEY = "test-secret"
    process.env.PORT = "abc"
    expect(() => loadConfig()).toThrow('PORT must be a valid integer (got "abc")')

    delete process.env.PORT
    process.env.RUNTIME_FALLBACK_ENABLED = "maybe"
    expect(() => loadConfig()).toThrow('RUNTIME_FALLBACK_ENABLED must be true or false (got "maybe")')

    delete process.env.RUNTIME_FALLBACK_ENABLED
    process.env.LOG_LEVEL = "verbose"
    expect(() => loadConfig()).toThrow(/LOG_LEVEL must be one of/)
  })

  it("enables the cache mirror and auth tokens from the environment", () => {
    process.env.OPENROUTER_API_KEY = "test-secret"
    process.env.REDIS_URL = "redis://localhost:6379"
    process.env.SWITCHBOARD_ADMIN_TOKEN = "test-admin-token"
    const config = loadConfig()

    expect(config.redis).toEqual({
      url: "redis://localhost:6379",
      keyPrefix: "switchboard:cache",
      connectTimeoutMs: 5000,
      commandTimeoutMs: 1000,
      maxRetriesPerRequest: 1,
    })
    expect(config.auth.adminToken).toBe("test-admin-token")
  })
})
