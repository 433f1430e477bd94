// tests/gateway/server.test.ts — HTTP surface: health, metrics, settings admin, reply

import { describe, it, expect } from "vitest"
import { createApp } from "../../src/gateway/server.js"
import { noopLogger } from "../../src/relay/logger.js"
import { harness } from "../helpers/relay-harness.js"

type Auth = { apiToken: string; adminToken: string; metricsToken: string }

const OPEN: Auth = { apiToken: "", adminToken: "", metricsToken: "" }

function setup(auth: Partial<Auth> = {}, opts: Parameters<typeof harness>[0] = {}) {
  const h = harness(opts)
  const app = createApp(
    { auth: { ...OPEN, ...auth } },
    {
      orchestrator: h.orchestrator,
      settings: h.settings,
      metrics: h.metrics,
      cache: h.cache,
      registry: h.registry,
      logger: noopLogger,
    },
  )
  return { app, h }
}

function postJson(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  }
}

const replyBody = {
  callerId: "alice",
  peerId: "chat-1",
  userText: "how are you?",
  history: [{ role: "assistant", text: "hi" }],
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

describe("GET /health", () => {
  it("reports healthy providers, pools and cache", async () => {
    const { app } = setup()
    const res = await app.request("/health")
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      status: "healthy",
      settings_version: 1,
      providers: { openrouter: { status: "healthy", circuit: "closed" } },
      pools: { aitunnel: { active: 0, waiting: 0, maxConnections: 4 } },
      cache: { size: 0 },
    })
  })

  it("is degraded when one provider is unusable", async () => {
    const { app, h } = setup()
    for (let i = 0; i < 6; i++) {
      h.health.recordOutcome({ provider: "aitunnel", success: false, latencyMs: 1, errorKind: "server" })
    }
    const res = await app.request("/health")
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ status: "degraded" })
  })

  it("is unhealthy with 503 when no provider is usable", async () => {
    const { app, h } = setup()
    for (const provider of ["openrouter", "aitunnel"] as const) {
      for (let i = 0; i < 6; i++) {
        h.health.recordOutcome({ provider, success: false, latencyMs: 1, errorKind: "timeout" })
      }
    }
    const res = await app.request("/health")
    expect(res.status).toBe(503)
    expect(await res.json()).toMatchObject({ status: "unhealthy" })
  })
})

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

describe("GET /metrics", () => {
  it("serves the exposition format when no token is configured", async () => {
    const { app } = setup()
    const res = await app.request("/metrics")
    expect(res.status).toBe(200)
    expect(res.headers.get("Content-Type")).toContain("text/plain")
    expect(await res.text()).toContain("# TYPE relay_requests_total counter")
  })

  it("requires the metrics token when one is configured", async () => {
    const { app } = setup({ metricsToken: "test-metrics-token" })
    expect((await app.request("/metrics")).status).toBe(401)
    const ok = await app.request("/metrics", { headers: { Authorization: "Bearer test-metrics-token" } })
    expect(ok.status).toBe(200)
  })
})

// ---------------------------------------------------------------------------
// Settings admin
// ---------------------------------------------------------------------------

describe("/api/v1/settings", () => {
  const admin = { Authorization: "Bearer test-admin-token" }

  it("is disabled without an admin token", async () => {
    const { app } = setup()
    const res = await app.request("/api/v1/settings")
    expect(res.status).toBe(403)
    expect(await res.json()).toEqual({ error: "Endpoint disabled", code: "AUTH_DISABLED" })
  })

  it("rejects a wrong admin token", async () => {
    const { app } = setup({ adminToken: "test-admin-token" })
    const res = await app.request("/api/v1/settings", { headers: { Authorization: "Bearer wrong" } })
    expect(res.status).toBe(401)
    expect(await res.json()).toMatchObject({ code: "AUTH_INVALID" })
  })

  it("reads and patches the live settings", async () => {
    const { app, h } = setup({ adminToken: "test-admin-token" })

    const current = await app.request("/api/v1/settings", { headers: admin })
    expect(await current.json()).toMatchObject({ version: 1 })

    const patched = await app.request("/api/v1/settings", {
      method: "PATCH",
      headers: { ...admin, "Content-Type": "application/json" },
      body: JSON.stringify({ temperature: 1, maxTokens: { openrouter: 120 } }),
    })
    expect(patched.status).toBe(200)
    expect(await patched.json()).toMatchObject({ version: 2, maxTokens: { openrouter: 120, aitunnel: 5000 } })
    expect(h.settings.current().temperature).toBe(1)
  })

  it("maps an invalid document to 400 CONFIG_INVALID", async () => {
    const { app } = setup({ adminToken: "test-admin-token" })
    const res = await app.request("/api/v1/settings", {
      method: "PATCH",
      headers: { ...admin, "Content-Type": "application/json" },
      body: JSON.stringify({ temperature: 5 }),
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ code: "CONFIG_INVALID", context: { path: "/temperature" } })
  })

  it("answers malformed JSON with INVALID_REQUEST", async () => {
    const { app } = setup({ adminToken: "test-admin-token" })
    const res = await app.request("/api/v1/settings", {
      method: "PUT",
      headers: { ...admin, "Content-Type": "application/json" },
      body: "{broken",
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: "Invalid JSON body", code: "INVALID_REQUEST" })
  })

  it("exports, imports and resets", async () => {
    const { app } = setup({ adminToken: "test-admin-token" })

    const exported = await app.request("/api/v1/settings/export", { headers: admin })
    expect(exported.headers.get("Content-Disposition")).toBe('attachment; filename="settings.json"')
    const document = await exported.text()

    const imported = await app.request("/api/v1/settings/import", { method: "POST", headers: admin, body: document })
    expect(imported.status).toBe(200)
    expect(await imported.json()).toMatchObject({ version: 2 })

    const reset = await app.request("/api/v1/settings/reset", { method: "POST", headers: admin })
    expect(await reset.json()).toMatchObject({ version: 3 })
  })
})

// ---------------------------------------------------------------------------
// Reply
// ---------------------------------------------------------------------------

describe("POST /api/v1/reply", () => {
  it("returns the reply and its metadata", async () => {
    const { app } = setup()
    const res = await app.request("/api/v1/reply", postJson(replyBody))
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      reply: "reply from openrouter",
      metadata: { providerUsed: "openrouter", attemptCount: 1, cacheHit: false },
    })
  })

  it("passes the provider preference through", async () => {
    const { app } = setup()
    const res = await app.request("/api/v1/reply", postJson({ ...replyBody, provider: "aitunnel" }))
    expect(await res.json()).toMatchObject({ metadata: { providerUsed: "aitunnel" } })
  })

  it("rejects malformed JSON", async () => {
    const { app } = setup()
    const res = await app.request("/api/v1/reply", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "not json",
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: "Invalid JSON body", code: "INVALID_REQUEST" })
  })

  it("rejects a body missing required fields", async () => {
    const { app } = setup()
    const res = await app.request("/api/v1/reply", postJson({ callerId: "alice", peerId: "chat-1" }))
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ code: "INVALID_REQUEST", error: expect.stringMatching(/^\/userText: /) })
  })

  it("maps rate limiting to 429 with Retry-After", async () => {
    const { app } = setup({}, {
      rateLimit: { perUser: { limit: 1, windowMs: 60_000 }, perPeer: { limit: 100, windowMs: 60_000 } },
    })
    await app.request("/api/v1/reply", postJson(replyBody))
    const res = await app.request("/api/v1/reply", postJson({ ...replyBody, userText: "again" }))

    expect(res.status).toBe(429)
    expect(res.headers.get("Retry-After")).toBe("60")
    expect(await res.json()).toEqual({
      error: "[relay] RATE_LIMITED: user over quota",
      code: "RATE_LIMITED",
      context: { scope: "user", retryAfterMs: 60_000 },
    })
  })

  it("maps content rejection to 422 without the matched reason", async () => {
    const { app } = setup()
    const res = await app.request("/api/v1/reply", postJson({ ...replyBody, userText: "please do not murder anyone" }))
    expect(res.status).toBe(422)
    expect(await res.json()).toEqual({
      error: "[relay] CONTENT_REJECTED: input blocked by keywords",
      code: "CONTENT_REJECTED",
      context: { stage: "input", rule: "keywords" },
    })
  })

  it("maps exhaustion to 503", async () => {
    const { app, h } = setup()
    h.openrouter.script(h.openrouter.fails("client", 400))
    h.aitunnel.script(h.aitunnel.fails("client", 400))
    const res = await app.request("/api/v1/reply", postJson(replyBody))
    expect(res.status).toBe(503)
    expect(await res.json()).toMatchObject({ code: "ALL_PROVIDERS_EXHAUSTED", context: { attemptCount: 2 } })
  })

  it("requires the API token when one is configured", async () => {
    const { app } = setup({ apiToken: "test-secret" })
    const missing = await app.request("/api/v1/reply", postJson(replyBody))
    expect(missing.status).toBe(401)
    expect(await missing.json()).toMatchObject({ code: "AUTH_REQUIRED" })

    const ok = await app.request("/api/v1/reply", postJson(replyBody, { Authorization: "Bearer test-secret" }))
    expect(ok.status).toBe(200)
  })
})
