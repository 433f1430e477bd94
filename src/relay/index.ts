// src/relay/index.ts — Relay assembly: config → wired components

import type { SwitchboardConfig } from "../config.js"
import { CircuitBreakerSet } from "./circuit-breaker.js"
import { buildContentFilter, loadContentRules } from "./content-filter.js"
import { ProviderHealthMonitor } from "./health.js"
import type { RelayLogger } from "./logger.js"
import { createRelayMetrics, type MetricRegistry } from "./metrics.js"
import { Orchestrator } from "./orchestrator.js"
import { createAITunnelAdapter, createOpenRouterAdapter } from "./providers/openai-compatible.js"
import { RateLimiter } from "./rate-limiter.js"
import { ProviderRegistry } from "./registry.js"
import { ResponseCache, type CacheMirror } from "./response-cache.js"
import { RetryPolicy } from "./retry-policy.js"
import { SettingsStore } from "./settings.js"

export interface Relay {
  orchestrator: Orchestrator
  settings: SettingsStore
  registry: ProviderRegistry
  health: ProviderHealthMonitor
  breakers: CircuitBreakerSet
  cache: ResponseCache
  metrics: MetricRegistry
}

export function createRelay(
  config: SwitchboardConfig,
  deps: { logger: RelayLogger; mirror?: CacheMirror; fetch?: typeof globalThis.fetch },
): Relay {
  const registry = new ProviderRegistry(config.maxConnectionsPerProvider)
  const openrouter = config.providers.openrouter
  if (openrouter) {
    registry.register(
      createOpenRouterAdapter(openrouter.apiKey, {
        baseUrl: openrouter.baseUrl,
        referer: config.openrouterAttribution.referer,
        title: config.openrouterAttribution.title,
        fetch: deps.fetch,
      }),
    )
  }
  const aitunnel = config.providers.aitunnel
  if (aitunnel) {
    registry.register(createAITunnelAdapter(aitunnel.apiKey, { baseUrl: aitunnel.baseUrl, fetch: deps.fetch }))
  }

  const settings = new SettingsStore(config.runtime, registry.ids())
  const health = new ProviderHealthMonitor(registry.adapters(), config.health, { logger: deps.logger })
  const breakers = new CircuitBreakerSet(registry.ids(), config.circuit)
  const cache = new ResponseCache(config.cache, { mirror: deps.mirror, logger: deps.logger })
  const metrics = createRelayMetrics()

  const orchestrator = new Orchestrator({
    settings,
    registry,
    limiter: new RateLimiter(config.rateLimit),
    cache,
    health,
    breakers,
    filter: buildContentFilter(loadContentRules(config.contentRulesPath)),
    metrics,
    retryPolicy: new RetryPolicy(config.retry),
    logger: deps.logger,
  })

  return { orchestrator, settings, registry, health, breakers, cache, metrics }
}
