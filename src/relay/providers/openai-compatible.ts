// src/relay/providers/openai-compatible.ts — Chat-completions adapter for OpenAI-compatible backends
//
// One class serves every backend that speaks POST {baseUrl}/chat/completions.
// Per-backend differences (extra headers, whether a reasoning block is sent)
// are plain options; the orchestrator never branches on provider identity.
// Adapters never retry or sleep: each call is one attempt.

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { ProviderCallError, kindFromStatus, toProviderCallError } from "../errors.js"
import type {
  CompletionRequest,
  CompletionResult,
  ProviderAdapter,
  ProviderId,
  ReasoningSettings,
} from "../types.js"

// --- Response schema ---

const ChatCompletionSchema = Type.Object({
  model: Type.Optional(Type.String()),
  choices: Type.Array(
    Type.Object({
      message: Type.Object({
        content: Type.Union([Type.String(), Type.Null()]),
      }),
    }),
    { minItems: 1 },
  ),
  usage: Type.Optional(
    Type.Object({
      prompt_tokens: Type.Number(),
      completion_tokens: Type.Number(),
    }),
  ),
})

type ChatCompletion = Static<typeof ChatCompletionSchema>

// --- Adapter ---

export interface OpenAICompatibleConfig {
  id: ProviderId
  baseUrl: string
  apiKey: string
  /** Sent with every request (e.g. attribution headers) */
  extraHeaders?: Record<string, string>
  /** Whether the backend accepts a `reasoning` block */
  supportsReasoning?: boolean
}

/** Body excerpt length kept in error messages */
const ERROR_BODY_PREVIEW = 200

export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly id: ProviderId
  private readonly baseUrl: string
  private readonly fetchFn: typeof globalThis.fetch

  constructor(
    private readonly config: OpenAICompatibleConfig,
    deps?: { fetch?: typeof globalThis.fetch },
  ) {
    this.id = config.id
    this.baseUrl = config.baseUrl.replace(/\/+$/, "")
    this.fetchFn = deps?.fetch ?? globalThis.fetch
  }

  async sendCompletion(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResult> {
    const body: Record<string, unknown> = {
      model: request.model,
      messages: request.messages,
      temperature: request.temperature,
      top_p: request.topP,
      max_tokens: request.maxTokens,
    }
    if (this.config.supportsReasoning && request.reasoning) {
      body.reasoning = reasoningBlock(request.reasoning)
    }

    const text = await this.call("/chat/completions", {
      method: "POST",
      headers: { ...this.headers(), "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal,
    })

    const parsed = this.parse(text)
    const content = parsed.choices[0].message.content?.trim() ?? ""
    if (!content) {
      throw new ProviderCallError({ provider: this.id, kind: "invalid_response", message: "empty completion" })
    }

    return {
      text: content,
      model: parsed.model ?? request.model,
      usage: parsed.usage
        ? { promptTokens: parsed.usage.prompt_tokens, completionTokens: parsed.usage.completion_tokens }
        : undefined,
    }
  }

  /** GET /models: cheap, unbilled liveness check. */
  async probe(signal: AbortSignal): Promise<void> {
    await this.call("/models", { method: "GET", headers: this.headers(), signal })
  }

  // --- Private ---

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.config.apiKey}`, ...this.config.extraHeaders }
  }

  private async call(path: string, init: RequestInit): Promise<string> {
    let response: Response
    let text: string
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, init)
      text = await response.text()
    } catch (err) {
      throw toProviderCallError(this.id, err)
    }

    if (!response.ok) {
      throw new ProviderCallError({
        provider: this.id,
        kind: kindFromStatus(response.status),
        statusCode: response.status,
        message: `HTTP ${response.status}: ${text.slice(0, ERROR_BODY_PREVIEW)}`,
      })
    }
    return text
  }

  private parse(text: string): ChatCompletion {
    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      throw new ProviderCallError({ provider: this.id, kind: "invalid_response", message: "body is not JSON", cause: err })
    }
    if (!Value.Check(ChatCompletionSchema, raw)) {
      const first = Value.Errors(ChatCompletionSchema, raw).First()
      throw new ProviderCallError({
        provider: this.id,
        kind: "invalid_response",
        message: `unexpected payload at ${first?.path ?? "/"}: ${first?.message ?? "schema mismatch"}`,
      })
    }
    return raw
  }
}

function reasoningBlock(reasoning: ReasoningSettings): Record<string, unknown> {
  if (!reasoning.enabled) return { exclude: true }
  return { enabled: true, max_tokens: reasoning.maxTokens, depth: reasoning.depth }
}

// --- Known backends ---

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1"
export const AITUNNEL_BASE_URL = "https://api.aitunnel.ru/v1"

export function createOpenRouterAdapter(
  apiKey: string,
  opts?: { baseUrl?: string; referer?: string; title?: string; fetch?: typeof globalThis.fetch },
): OpenAICompatibleAdapter {
  return new OpenAICompatibleAdapter(
    {
      id: "openrouter",
      baseUrl: opts?.baseUrl ?? OPENROUTER_BASE_URL,
      apiKey,
      extraHeaders: {
        "HTTP-Referer": opts?.referer ?? "https://localhost",
        "X-Title": opts?.title ?? "switchboard",
      },
    },
    { fetch: opts?.fetch },
  )
}

export function createAITunnelAdapter(
  apiKey: string,
  opts?: { baseUrl?: string; fetch?: typeof globalThis.fetch },
): OpenAICompatibleAdapter {
  return new OpenAICompatibleAdapter(
    { id: "aitunnel", baseUrl: opts?.baseUrl ?? AITUNNEL_BASE_URL, apiKey, supportsReasoning: true },
    { fetch: opts?.fetch },
  )
}
