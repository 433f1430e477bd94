// tests/helpers/relay-harness.ts — Orchestrator wired to scripted in-process providers

import { CircuitBreakerSet } from "../../src/relay/circuit-breaker.js"
import { buildContentFilter, loadContentRules } from "../../src/relay/content-filter.js"
import { ProviderCallError, type ProviderErrorKind } from "../../src/relay/errors.js"
import { ProviderHealthMonitor } from "../../src/relay/health.js"
import { createRelayMetrics } from "../../src/relay/metrics.js"
import { Orchestrator } from "../../src/relay/orchestrator.js"
import { RateLimiter, type RateLimitConfig } from "../../src/relay/rate-limiter.js"
import { ProviderRegistry } from "../../src/relay/registry.js"
import { ResponseCache, type CacheMirror } from "../../src/relay/response-cache.js"
import { RetryPolicy } from "../../src/relay/retry-policy.js"
import { DEFAULT_SETTINGS_INPUT, SettingsStore, type SettingsInput } from "../../src/relay/settings.js"
import type { CompletionRequest, CompletionResult, ProviderAdapter, ProviderId } from "../../src/relay/types.js"

// --- Scripted provider ---

export type Step = (request: CompletionRequest, signal: AbortSignal) => Promise<CompletionResult>

export class ScriptedProvider implements ProviderAdapter {
  readonly calls: CompletionRequest[] = []
  private readonly steps: Step[] = []

  constructor(readonly id: ProviderId) {}

  script(...steps: Step[]): this {
    this.steps.push(...steps)
    return this
  }

  replies(text: string): Step {
    return async (request) => ({ text, model: request.model })
  }

  fails(kind: ProviderErrorKind, statusCode?: number): Step {
    return async () => {
      throw new ProviderCallError({ provider: this.id, kind, statusCode, message: "scripted failure" })
    }
  }

  /** Never settles on its own; rejects like fetch once the signal aborts. */
  hangs(): Step {
    return (_request, signal) =>
      new Promise((_resolve, reject) => {
        signal.addEventListener(
          "abort",
          () => {
            const err = new Error("aborted")
            err.name = "AbortError"
            reject(err)
          },
          { once: true },
        )
      })
  }

  async sendCompletion(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    this.calls.push(request)
    const step = this.steps.shift() ?? this.replies(`reply from ${this.id}`)
    return step(request, signal)
  }

  async probe(): Promise<void> {}
}

// --- Harness ---

export function harness(
  opts: { settings?: Partial<SettingsInput>; rateLimit?: RateLimitConfig; mirror?: CacheMirror } = {},
) {
  const clock = () => 0
  const openrouter = new ScriptedProvider("openrouter")
  const aitunnel = new ScriptedProvider("aitunnel")
  const registry = new ProviderRegistry(4).register(openrouter).register(aitunnel)
  const settings = new SettingsStore({ ...DEFAULT_SETTINGS_INPUT, ...opts.settings }, registry.ids())
  const health = new ProviderHealthMonitor(registry.adapters(), {}, { clock })
  const breakers = new CircuitBreakerSet(registry.ids(), { failureThreshold: 3 }, clock)
  const cache = new ResponseCache({}, { clock, mirror: opts.mirror })
  const metrics = createRelayMetrics()
  const sleeps: number[] = []
  let ids = 0

  const orchestrator = new Orchestrator({
    settings,
    registry,
    limiter: new RateLimiter(
      opts.rateLimit ?? {
        perUser: { limit: 100, windowMs: 60_000 },
        perPeer: { limit: 100, windowMs: 60_000 },
      },
      clock,
    ),
    cache,
    health,
    breakers,
    filter: buildContentFilter(loadContentRules()),
    metrics,
    retryPolicy: new RetryPolicy({ baseDelayMs: 500 }, () => 0.5),
    clock,
    sleep: async (ms) => {
      sleeps.push(ms)
    },
    newRequestId: () => `req-${++ids}`,
  })

  return { orchestrator, openrouter, aitunnel, registry, settings, health, breakers, cache, metrics, sleeps }
}
