// src/relay/orchestrator.ts — Reply orchestration: rate limit, cache, single-flight, retry and fallback
//
// generateReply is the only entry point request traffic uses. Internal
// retries and fallback are invisible to callers; only terminal conditions
// leave as RelayError. AbortController hierarchy: deadline → attempt.

import { ulid } from "ulid"
import type { CircuitBreakerSet, CircuitPermit, CircuitPhase } from "./circuit-breaker.js"
import { PoolExhaustedError } from "./connection-pool.js"
import type { ContentFilter, FilterResult, FilterStage } from "./content-filter.js"
import {
  ProviderCallError,
  RelayError,
  countsAsFailure,
  isRelayError,
  toProviderCallError,
} from "./errors.js"
import { HEALTH_STATUS_VALUE, type HealthRecord, type ProviderHealthMonitor } from "./health.js"
import { clampReply, summarizeHistory } from "./history.js"
import { errorMessage, noopLogger, type RelayLogger } from "./logger.js"
import { RELAY_METRICS, type MetricRegistry } from "./metrics.js"
import type { RateLimiter } from "./rate-limiter.js"
import type { ProviderRegistry } from "./registry.js"
import { fingerprint, type CacheEntry, type ResponseCache } from "./response-cache.js"
import { RetryPolicy, sleep } from "./retry-policy.js"
import type { SettingsStore } from "./settings.js"
import { FlightCancelledError, SingleFlight } from "./single-flight.js"
import type {
  CallOutcome,
  ChatMessage,
  CompletionMessage,
  CompletionResult,
  GenerateReplyRequest,
  ProviderId,
  ProviderPreference,
  ReplyResult,
  RuntimeSettings,
} from "./types.js"

// --- Types ---

export interface OrchestratorDeps {
  settings: SettingsStore
  registry: ProviderRegistry
  limiter: RateLimiter
  cache: ResponseCache
  health: ProviderHealthMonitor
  breakers: CircuitBreakerSet
  filter: ContentFilter
  metrics: MetricRegistry
  retryPolicy?: RetryPolicy
  logger?: RelayLogger
  clock?: () => number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  newRequestId?: () => string
}

export interface ProviderHealthView extends HealthRecord {
  circuit: CircuitPhase
}

type AbortCause = "deadline" | "caller"

/** Overall time budget for one generateReply call, linked to the caller's signal. */
class Deadline {
  private readonly controller = new AbortController()
  private readonly timer: ReturnType<typeof setTimeout>
  private readonly expiresAt: number
  private readonly onCallerAbort = () => this.abort("caller")
  cause: AbortCause | null = null

  constructor(
    readonly budgetMs: number,
    private readonly clock: () => number,
    private readonly external?: AbortSignal,
  ) {
    this.expiresAt = clock() + budgetMs
    this.timer = setTimeout(() => this.abort("deadline"), budgetMs)
    if (external?.aborted) this.abort("caller")
    else external?.addEventListener("abort", this.onCallerAbort, { once: true })
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  remaining(): number {
    return Math.max(0, this.expiresAt - this.clock())
  }

  dispose(): void {
    clearTimeout(this.timer)
    this.external?.removeEventListener("abort", this.onCallerAbort)
  }

  private abort(cause: AbortCause): void {
    if (this.cause) return
    this.cause = cause
    this.controller.abort()
  }
}

interface LeadContext {
  requestId: string
  startedAt: number
  key: string
  settings: RuntimeSettings
  preference: ProviderPreference
  systemPrompt: string
  history: ChatMessage[]
  userText: string
  signal?: AbortSignal
}

type AttemptResult =
  | { ok: true; result: CompletionResult }
  | { ok: false; error: ProviderCallError | RelayError }

// --- Orchestrator ---

export class Orchestrator {
  private readonly flights = new SingleFlight<ReplyResult>()
  private readonly retryPolicy: RetryPolicy
  private readonly log: RelayLogger
  private readonly clock: () => number
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly newRequestId: () => string

  constructor(private readonly deps: OrchestratorDeps) {
    this.retryPolicy = deps.retryPolicy ?? new RetryPolicy()
    this.log = (deps.logger ?? noopLogger).child("orchestrator")
    this.clock = deps.clock ?? Date.now
    this.sleep = deps.sleep ?? sleep
    this.newRequestId = deps.newRequestId ?? ulid

    for (const id of deps.registry.ids()) {
      deps.metrics.setGauge(RELAY_METRICS.circuitOpen, { provider: id }, 0)
      deps.metrics.setGauge(RELAY_METRICS.healthStatus, { provider: id }, HEALTH_STATUS_VALUE.healthy)
    }
    deps.breakers.onTransition(({ provider, from, to }) => {
      deps.metrics.setGauge(RELAY_METRICS.circuitOpen, { provider }, to === "open" ? 1 : 0)
      this.log.info("circuit transition", { provider, from, to })
    })
    deps.health.on("status", ({ provider, to }: { provider: ProviderId; to: HealthRecord["status"] }) => {
      deps.metrics.setGauge(RELAY_METRICS.healthStatus, { provider }, HEALTH_STATUS_VALUE[to])
    })
  }

  async generateReply(request: GenerateReplyRequest): Promise<ReplyResult> {
    const { deps } = this
    const settings = request.settings ?? deps.settings.current()
    const preference = request.providerPreference ?? "auto"
    const startedAt = this.clock()
    const requestId = this.newRequestId()

    // 1. Admission
    const decision = deps.limiter.tryAcquire(request.callerId, request.peerId)
    if (!decision.allowed) {
      deps.metrics.incrementCounter(RELAY_METRICS.rateLimited, { scope: decision.scope })
      throw new RelayError("RATE_LIMITED", `${decision.scope} over quota`, {
        scope: decision.scope,
        retryAfterMs: decision.retryAfterMs,
      })
    }

    // 2. Summarize, fingerprint, cache
    const history = summarizeHistory(request.history, {
      maxMessages: settings.maxHistory,
      maxTokens: settings.historyTokenBudget,
    })
    const key = fingerprint({
      preference,
      systemPrompt: request.systemPrompt,
      history,
      userText: request.userText,
      settings,
    })

    const cached = await deps.cache.lookup(key)
    if (cached) return this.cachedReply(cached, requestId, startedAt, settings)

    // 3. Single-flight. The shared work runs under the flight's signal, which
    // aborts only when every waiting caller has cancelled.
    const { promise, joined } = this.flights.do(
      key,
      (signal) => {
        // A leader that finished while our mirror read was pending
        const late = deps.cache.peek(key)
        if (late) return Promise.resolve(this.cachedReply(late, requestId, startedAt, settings))
        return this.lead({
          requestId,
          startedAt,
          key,
          settings,
          preference,
          systemPrompt: request.systemPrompt,
          history,
          userText: request.userText,
          signal,
        })
      },
      request.signal,
    )
    if (joined) {
      deps.metrics.incrementCounter(RELAY_METRICS.singleFlightJoined)
      this.log.debug("joined in-flight request", { request_id: requestId })
    }

    try {
      return await promise
    } catch (err) {
      if (!(err instanceof FlightCancelledError)) throw err
      this.log.info("request cancelled by caller", { request_id: requestId, joined })
      throw new RelayError("TIMEOUT", "request cancelled by caller", {
        cause: "caller",
        deadlineMs: settings.deadlineMs,
        attemptCount: 0,
      })
    }
  }

  /** Health record and circuit phase per registered provider. */
  getHealth(): Partial<Record<ProviderId, ProviderHealthView>> {
    const out: Partial<Record<ProviderId, ProviderHealthView>> = {}
    for (const id of this.deps.registry.ids()) {
      const record = this.deps.health.getRecord(id)
      if (!record) continue
      out[id] = { ...record, circuit: this.deps.breakers.get(id).snapshot().phase }
    }
    return out
  }

  /**
   * Providers to try, in order: preference first, then the configured order.
   * Down or circuit-open providers are skipped, including a preferred one.
   */
  candidates(settings: RuntimeSettings, preference: ProviderPreference): ProviderId[] {
    const ordered =
      preference === "auto"
        ? [...settings.providerOrder]
        : [preference, ...settings.providerOrder.filter((id) => id !== preference)]

    const available = ordered.filter(
      (id) =>
        this.deps.registry.has(id) &&
        this.deps.health.isAvailable(id) &&
        this.deps.breakers.get(id).canAttempt(),
    )
    return settings.fallbackEnabled ? available : available.slice(0, 1)
  }

  // --- Leader path ---

  private async lead(ctx: LeadContext): Promise<ReplyResult> {
    const { deps } = this
    const { settings } = ctx
    const deadline = new Deadline(settings.deadlineMs, this.clock, ctx.signal)

    try {
      // 4. Pre-check
      const input = this.screen(ctx.userText, "input")

      // 5. Candidates
      const candidates = this.candidates(settings, ctx.preference)
      const messages = buildMessages(ctx.systemPrompt, ctx.history, input.text)

      // 6. Attempt loop
      let attemptCount = 0
      let lastError: ProviderCallError | RelayError = new RelayError(
        "PROVIDER_UNAVAILABLE",
        "no provider is currently available",
        { preference: ctx.preference },
      )

      // Each model of a provider gets up to retryCount attempts before the
      // next model; an open circuit or a provider-wide error moves on to
      // the next provider.
      for (const provider of candidates) {
        const maxAttempts = settings.retryCount[provider]

        models: for (const model of settings.models[provider]) {
          for (let attempt = 0; attempt < maxAttempts; attempt++) {
            if (deadline.signal.aborted) throw this.timeoutError(ctx, deadline, attemptCount, lastError)

            const permit = deps.breakers.get(provider).tryAcquire()
            if (!permit) {
              lastError = new RelayError("PROVIDER_UNAVAILABLE", `circuit for ${provider} is open`, { provider })
              break models
            }

            attemptCount++
            const outcome = await this.attempt(provider, model, permit, settings, messages, deadline)

            if (outcome.ok) {
              return this.finish(ctx, provider, outcome.result, attemptCount, input.redactions)
            }

            lastError = outcome.error
            if (deadline.signal.aborted) throw this.timeoutError(ctx, deadline, attemptCount, lastError)
            if (!(outcome.error instanceof ProviderCallError)) break models

            const { kind } = outcome.error
            if (kind === "rate_limited") break models
            if (!this.retryPolicy.shouldRetry(attempt, maxAttempts, kind)) break

            await this.sleep(this.retryPolicy.delayFor(attempt), deadline.signal)
          }
          this.log.info("model exhausted", { request_id: ctx.requestId, provider, model, error: errorMessage(lastError) })
        }
      }

      // 8. Exhausted
      this.log.warn("all providers exhausted", {
        request_id: ctx.requestId,
        attempts: attemptCount,
        candidates,
        error: errorMessage(lastError),
      })
      throw new RelayError(
        "ALL_PROVIDERS_EXHAUSTED",
        attemptCount === 0 ? "no provider was available" : `every candidate failed after ${attemptCount} attempts`,
        { attemptCount, candidates },
        { cause: lastError },
      )
    } finally {
      deadline.dispose()
    }
  }

  /** One provider call: pool slot, per-attempt timeout, outcome bookkeeping. */
  private async attempt(
    provider: ProviderId,
    model: string,
    permit: CircuitPermit,
    settings: RuntimeSettings,
    messages: CompletionMessage[],
    deadline: Deadline,
  ): Promise<AttemptResult> {
    const { deps } = this
    const entry = deps.registry.get(provider)
    const breaker = deps.breakers.get(provider)
    if (!entry) {
      breaker.release(permit)
      return { ok: false, error: new RelayError("PROVIDER_UNAVAILABLE", `${provider} is not registered`, { provider }) }
    }

    const timeoutMs = Math.min(settings.timeoutMs[provider], deadline.remaining())
    const started = this.clock()

    let release: () => void
    try {
      release = await entry.pool.acquire(timeoutMs)
    } catch (err) {
      breaker.release(permit)
      const error =
        err instanceof PoolExhaustedError
          ? new ProviderCallError({ provider, kind: "pool_exhausted", message: err.message, cause: err })
          : toProviderCallError(provider, err)
      this.countAttempt(provider, error.kind)
      return { ok: false, error }
    }

    const controller = new AbortController()
    const onDeadline = () => controller.abort()
    if (deadline.signal.aborted) controller.abort()
    else deadline.signal.addEventListener("abort", onDeadline, { once: true })
    const remainingMs = Math.max(0, timeoutMs - (this.clock() - started))
    const timer = setTimeout(() => controller.abort(), remainingMs)

    try {
      const result = await raceAbort(
        entry.adapter.sendCompletion(
          {
            model,
            messages,
            temperature: settings.temperature,
            topP: settings.topP,
            maxTokens: maxTokensFor(settings, provider, model),
            reasoning: settings.reasoning,
          },
          controller.signal,
        ),
        controller.signal,
        provider,
      )
      const latencyMs = this.clock() - started
      breaker.recordSuccess(permit)
      this.report({ provider, success: true, latencyMs })
      return { ok: true, result }
    } catch (err) {
      const latencyMs = this.clock() - started
      const error = controller.signal.aborted
        ? new ProviderCallError({ provider, kind: "timeout", message: `no reply within ${timeoutMs}ms`, cause: err })
        : toProviderCallError(provider, err)

      if (deadline.cause === "caller") {
        // Cancelled by the caller; says nothing about the provider
        breaker.release(permit)
        return { ok: false, error }
      }

      if (countsAsFailure(error.kind)) breaker.recordFailure(permit)
      else breaker.release(permit)
      this.report({ provider, success: false, latencyMs, errorKind: error.kind })
      this.log.warn("attempt failed", {
        provider,
        kind: error.kind,
        status_code: error.statusCode,
        latency_ms: latencyMs,
        error: error.message,
      })
      return { ok: false, error }
    } finally {
      clearTimeout(timer)
      deadline.signal.removeEventListener("abort", onDeadline)
      release()
    }
  }

  private finish(
    ctx: LeadContext,
    provider: ProviderId,
    result: CompletionResult,
    attemptCount: number,
    inputRedactions: string[],
  ): ReplyResult {
    const { deps } = this
    // 7. Post-check, clamp, cache
    const output = this.screen(result.text, "output")
    const reply = clampReply(output.text, ctx.settings.maxReplyChars)
    deps.cache.set(ctx.key, { reply, provider, model: result.model })
    deps.metrics.incrementCounter(RELAY_METRICS.requests, { provider })

    const latencyMs = this.clock() - ctx.startedAt
    this.log.info("reply generated", {
      request_id: ctx.requestId,
      provider,
      model: result.model,
      attempts: attemptCount,
      latency_ms: latencyMs,
    })

    return {
      reply,
      metadata: {
        requestId: ctx.requestId,
        providerUsed: provider,
        model: result.model,
        latencyMs,
        attemptCount,
        cacheHit: false,
        settingsVersion: ctx.settings.version,
        redactions: [...inputRedactions, ...output.redactions],
      },
    }
  }

  private cachedReply(
    entry: CacheEntry,
    requestId: string,
    startedAt: number,
    settings: RuntimeSettings,
  ): ReplyResult {
    const { metrics } = this.deps
    metrics.incrementCounter(RELAY_METRICS.cacheHits, { provider: entry.provider })
    metrics.incrementCounter(RELAY_METRICS.requests, { provider: entry.provider })
    return {
      reply: entry.reply,
      metadata: {
        requestId,
        providerUsed: entry.provider,
        model: entry.model,
        latencyMs: this.clock() - startedAt,
        attemptCount: 0,
        cacheHit: true,
        settingsVersion: settings.version,
        redactions: [],
      },
    }
  }

  private screen(text: string, stage: FilterStage): FilterResult {
    try {
      return this.deps.filter.check(text, stage)
    } catch (err) {
      if (isRelayError(err, "CONTENT_REJECTED")) {
        this.deps.metrics.incrementCounter(RELAY_METRICS.contentRejected, { stage })
        this.log.info("content rejected", { stage, ...err.context })
      }
      throw err
    }
  }

  /** Feed one attempt outcome to health and metrics. */
  private report(outcome: CallOutcome): void {
    const { metrics, health } = this.deps
    health.recordOutcome(outcome)
    metrics.observeHistogram(RELAY_METRICS.latency, { provider: outcome.provider }, outcome.latencyMs / 1000)
    this.countAttempt(outcome.provider, outcome.success ? "success" : (outcome.errorKind ?? "network"))
  }

  private countAttempt(provider: ProviderId, outcome: string): void {
    const { metrics } = this.deps
    metrics.incrementCounter(RELAY_METRICS.attempts, { provider, outcome })
    if (outcome !== "success") metrics.incrementCounter(RELAY_METRICS.failures, { provider, kind: outcome })
  }

  private timeoutError(
    ctx: LeadContext,
    deadline: Deadline,
    attemptCount: number,
    lastError: ProviderCallError | RelayError,
  ): RelayError {
    const cause = deadline.cause ?? "deadline"
    this.log.warn("request timed out", { request_id: ctx.requestId, cause, attempts: attemptCount })
    return new RelayError(
      "TIMEOUT",
      cause === "caller" ? "request cancelled by caller" : `deadline of ${deadline.budgetMs}ms exceeded`,
      { cause, deadlineMs: deadline.budgetMs, attemptCount },
      { cause: lastError },
    )
  }
}

// --- Helpers ---

/** Provider token limit, lowered by the model's cap while reasoning is off. */
function maxTokensFor(settings: RuntimeSettings, provider: ProviderId, model: string): number {
  const limit = settings.maxTokens[provider]
  const cap = settings.modelMaxTokens[model]
  return !settings.reasoning.enabled && cap !== undefined ? Math.min(limit, cap) : limit
}

function buildMessages(systemPrompt: string, history: readonly ChatMessage[], userText: string): CompletionMessage[] {
  const messages: CompletionMessage[] = []
  if (systemPrompt) messages.push({ role: "system", content: systemPrompt })
  for (const m of history) messages.push({ role: m.role, content: m.text })
  messages.push({ role: "user", content: userText })
  return messages
}

/**
 * Settle with `work`, or reject as a timeout as soon as `signal` aborts,
 * whichever comes first. Covers adapters that ignore their signal.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal, provider: ProviderId): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () =>
      reject(new ProviderCallError({ provider, kind: "timeout", message: "attempt aborted" }))
    if (signal.aborted) onAbort()
    else signal.addEventListener("abort", onAbort, { once: true })
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(err)
      },
    )
  })
}
