// src/gateway/server.ts — Hono HTTP surface for the relay

import { Hono } from "hono"
import type { SwitchboardConfig } from "../config.js"
import type { RelayLogger } from "../relay/logger.js"
import type { MetricRegistry } from "../relay/metrics.js"
import type { Orchestrator } from "../relay/orchestrator.js"
import type { ProviderRegistry } from "../relay/registry.js"
import type { ResponseCache } from "../relay/response-cache.js"
import type { SettingsStore } from "../relay/settings.js"
import { bearerAuth } from "./auth.js"
import { metricsRoutes } from "./metrics-endpoint.js"
import { createReplyHandler } from "./routes/reply.js"
import { settingsRoutes } from "./routes/settings.js"

export interface AppOptions {
  orchestrator: Orchestrator
  settings: SettingsStore
  metrics: MetricRegistry
  cache: ResponseCache
  registry: ProviderRegistry
  logger: RelayLogger
  /** Extra health fields, e.g. cache mirror connection state */
  healthExtras?: () => Record<string, unknown>
}

export function createApp(config: Pick<SwitchboardConfig, "auth">, options: AppOptions): Hono {
  const app = new Hono()
  const log = options.logger.child("gateway")

  // Health endpoint (no auth required)
  app.get("/health", (c) => {
    const providers = options.orchestrator.getHealth()
    const usable = Object.values(providers).filter(
      (p) => p !== undefined && p.status !== "down" && p.circuit !== "open",
    ).length
    const total = Object.keys(providers).length
    const status = usable === 0 ? "unhealthy" : usable < total ? "degraded" : "healthy"

    return c.json(
      {
        status,
        uptime: process.uptime(),
        settings_version: options.settings.current().version,
        providers,
        pools: options.registry.poolStats(),
        cache: options.cache.stats(),
        ...options.healthExtras?.(),
      },
      status === "unhealthy" ? 503 : 200,
    )
  })

  app.route("/metrics", metricsRoutes(options.metrics, config.auth.metricsToken))

  const settingsApp = new Hono()
  settingsApp.use("*", bearerAuth(config.auth.adminToken, "closed"))
  settingsApp.route("/", settingsRoutes(options.settings, log))
  app.route("/api/v1/settings", settingsApp)

  app.use("/api/v1/reply", bearerAuth(config.auth.apiToken, "open"))
  app.post("/api/v1/reply", createReplyHandler(options.orchestrator, log))

  return app
}
