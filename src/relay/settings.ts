// src/relay/settings.ts — Versioned, hot-swappable runtime settings
//
// A snapshot is frozen and replaced as a whole. Readers capture current()
// once and keep that object for the duration of their call, so a concurrent
// update is never observed half-applied.

import { EventEmitter } from "node:events"
import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { RelayError } from "./errors.js"
import type { ProviderId, RuntimeSettings } from "./types.js"

// --- Schemas ---

const ProviderIdSchema = Type.Union([Type.Literal("openrouter"), Type.Literal("aitunnel")])

function perProvider<T extends TSchema>(schema: T) {
  return Type.Object({ openrouter: schema, aitunnel: schema }, { additionalProperties: false })
}

const ReasoningSchema = Type.Object(
  {
    enabled: Type.Boolean(),
    maxTokens: Type.Integer({ minimum: 1 }),
    depth: Type.Union([Type.Literal("low"), Type.Literal("medium"), Type.Literal("high")]),
  },
  { additionalProperties: false },
)

const settingsFields = {
  temperature: Type.Number({ minimum: 0, maximum: 2 }),
  topP: Type.Number({ exclusiveMinimum: 0, maximum: 1 }),
  maxTokens: perProvider(Type.Integer({ minimum: 1 })),
  /** Tried in order within a provider before falling back to the next one */
  models: perProvider(Type.Array(Type.String({ minLength: 1 }), { minItems: 1 })),
  /** Per-model ceiling on maxTokens, applied while reasoning is off */
  modelMaxTokens: Type.Record(Type.String(), Type.Integer({ minimum: 1 })),
  maxHistory: Type.Integer({ minimum: 1 }),
  historyTokenBudget: Type.Integer({ minimum: 1 }),
  maxReplyChars: Type.Integer({ minimum: 1 }),
  retryCount: perProvider(Type.Integer({ minimum: 1 })),
  timeoutMs: perProvider(Type.Integer({ minimum: 1 })),
  providerOrder: Type.Array(ProviderIdSchema, { minItems: 1 }),
  fallbackEnabled: Type.Boolean(),
  deadlineMs: Type.Integer({ minimum: 1 }),
  reasoning: ReasoningSchema,
}

/** Full settings body (everything but the version, which the store assigns). */
export const SettingsInputSchema = Type.Object(settingsFields, { additionalProperties: false })
export type SettingsInput = Static<typeof SettingsInputSchema>

/** Exported document: a settings body that may carry its old version number. */
const SettingsDocumentSchema = Type.Object(
  { ...settingsFields, version: Type.Optional(Type.Integer({ minimum: 1 })) },
  { additionalProperties: false },
)

/** Partial update. Per-provider maps and reasoning merge key by key. */
export const SettingsPatchSchema = Type.Object(
  {
    temperature: Type.Optional(settingsFields.temperature),
    topP: Type.Optional(settingsFields.topP),
    maxTokens: Type.Optional(Type.Partial(settingsFields.maxTokens)),
    models: Type.Optional(Type.Partial(settingsFields.models)),
    modelMaxTokens: Type.Optional(settingsFields.modelMaxTokens),
    maxHistory: Type.Optional(settingsFields.maxHistory),
    historyTokenBudget: Type.Optional(settingsFields.historyTokenBudget),
    maxReplyChars: Type.Optional(settingsFields.maxReplyChars),
    retryCount: Type.Optional(Type.Partial(settingsFields.retryCount)),
    timeoutMs: Type.Optional(Type.Partial(settingsFields.timeoutMs)),
    providerOrder: Type.Optional(settingsFields.providerOrder),
    fallbackEnabled: Type.Optional(settingsFields.fallbackEnabled),
    deadlineMs: Type.Optional(settingsFields.deadlineMs),
    reasoning: Type.Optional(Type.Partial(ReasoningSchema)),
  },
  { additionalProperties: false },
)
export type SettingsPatch = Static<typeof SettingsPatchSchema>

// --- Defaults ---

export const DEFAULT_SETTINGS_INPUT: SettingsInput = {
  temperature: 0.6,
  topP: 1.0,
  maxTokens: { openrouter: 80, aitunnel: 5000 },
  models: {
    openrouter: ["deepseek/deepseek-chat-v3-0324:free"],
    aitunnel: ["deepseek-r1-fast", "gpt-5-nano", "gpt-3.5-turbo"],
  },
  modelMaxTokens: { "gpt-5-nano": 200 },
  maxHistory: 8,
  historyTokenBudget: 2000,
  maxReplyChars: 380,
  retryCount: { openrouter: 2, aitunnel: 2 },
  timeoutMs: { openrouter: 60_000, aitunnel: 60_000 },
  providerOrder: ["openrouter", "aitunnel"],
  fallbackEnabled: true,
  deadlineMs: 90_000,
  reasoning: { enabled: false, maxTokens: 100, depth: "medium" },
}

// --- Validation ---

/**
 * Schema check plus the rules a schema cannot express. Throws CONFIG_INVALID.
 */
export function validateSettings(
  candidate: unknown,
  knownProviders: readonly ProviderId[],
): SettingsInput {
  if (!Value.Check(SettingsInputSchema, candidate)) {
    throw schemaError(SettingsInputSchema, candidate)
  }

  const seen = new Set<ProviderId>()
  for (const id of candidate.providerOrder) {
    if (seen.has(id)) {
      throw new RelayError("CONFIG_INVALID", `providerOrder lists "${id}" twice`, { field: "providerOrder" })
    }
    if (!knownProviders.includes(id)) {
      throw new RelayError("CONFIG_INVALID", `providerOrder names unregistered provider "${id}"`, {
        field: "providerOrder",
        registered: [...knownProviders],
      })
    }
    seen.add(id)
  }
  return candidate
}

function schemaError(schema: TSchema, value: unknown): RelayError {
  const first = Value.Errors(schema, value).First()
  return new RelayError("CONFIG_INVALID", `settings rejected: ${first?.message ?? "invalid document"}`, {
    path: first?.path,
  })
}

function freeze(input: SettingsInput, version: number): RuntimeSettings {
  return Object.freeze({
    ...input,
    version,
    maxTokens: Object.freeze({ ...input.maxTokens }),
    models: Object.freeze({
      openrouter: Object.freeze([...input.models.openrouter]),
      aitunnel: Object.freeze([...input.models.aitunnel]),
    }),
    modelMaxTokens: Object.freeze({ ...input.modelMaxTokens }),
    retryCount: Object.freeze({ ...input.retryCount }),
    timeoutMs: Object.freeze({ ...input.timeoutMs }),
    providerOrder: Object.freeze([...input.providerOrder]),
    reasoning: Object.freeze({ ...input.reasoning }),
  })
}

function strip(settings: RuntimeSettings): SettingsInput {
  return {
    temperature: settings.temperature,
    topP: settings.topP,
    maxTokens: { ...settings.maxTokens },
    models: { openrouter: [...settings.models.openrouter], aitunnel: [...settings.models.aitunnel] },
    modelMaxTokens: { ...settings.modelMaxTokens },
    maxHistory: settings.maxHistory,
    historyTokenBudget: settings.historyTokenBudget,
    maxReplyChars: settings.maxReplyChars,
    retryCount: { ...settings.retryCount },
    timeoutMs: { ...settings.timeoutMs },
    providerOrder: [...settings.providerOrder],
    fallbackEnabled: settings.fallbackEnabled,
    deadlineMs: settings.deadlineMs,
    reasoning: { ...settings.reasoning },
  }
}

// --- Store ---

export interface SettingsChange {
  from: number
  to: number
}

export class SettingsStore extends EventEmitter {
  private snapshot: RuntimeSettings
  private readonly initial: SettingsInput

  constructor(
    initial: SettingsInput,
    private readonly knownProviders: readonly ProviderId[],
  ) {
    super()
    this.initial = strip(freeze(validateSettings(initial, knownProviders), 1))
    this.snapshot = freeze(this.initial, 1)
  }

  /** The live snapshot. Frozen; safe to hold for the duration of a call. */
  current(): RuntimeSettings {
    return this.snapshot
  }

  /** Replace every field. The version moves forward by one. */
  replace(next: unknown): RuntimeSettings {
    const valid = validateSettings(next, this.knownProviders)
    return this.swap(valid)
  }

  /** Merge a partial update into the current snapshot, then replace. */
  update(patch: unknown): RuntimeSettings {
    if (!Value.Check(SettingsPatchSchema, patch)) {
      throw schemaError(SettingsPatchSchema, patch)
    }
    const base = strip(this.snapshot)
    const merged: SettingsInput = {
      ...base,
      ...pickDefined(patch),
      maxTokens: { ...base.maxTokens, ...pickDefined(patch.maxTokens ?? {}) },
      models: { ...base.models, ...pickDefined(patch.models ?? {}) },
      retryCount: { ...base.retryCount, ...pickDefined(patch.retryCount ?? {}) },
      timeoutMs: { ...base.timeoutMs, ...pickDefined(patch.timeoutMs ?? {}) },
      reasoning: { ...base.reasoning, ...pickDefined(patch.reasoning ?? {}) },
    }
    return this.replace(merged)
  }

  exportJson(): string {
    return JSON.stringify(this.snapshot, null, 2)
  }

  /** Load an exported document. Its version field, if any, is ignored. */
  importJson(json: string): RuntimeSettings {
    let parsed: unknown
    try {
      parsed = JSON.parse(json)
    } catch (err) {
      throw new RelayError("CONFIG_INVALID", "settings document is not valid JSON", {}, { cause: err })
    }
    if (!Value.Check(SettingsDocumentSchema, parsed)) {
      throw schemaError(SettingsDocumentSchema, parsed)
    }
    const { version: _ignored, ...body } = parsed
    return this.replace(body)
  }

  /** Return to the settings the store was created with. */
  reset(): RuntimeSettings {
    return this.swap(this.initial)
  }

  private swap(next: SettingsInput): RuntimeSettings {
    const from = this.snapshot.version
    this.snapshot = freeze(next, from + 1)
    const change: SettingsChange = { from, to: this.snapshot.version }
    this.emit("change", change)
    return this.snapshot
  }
}

/** Drop keys whose value is undefined so a spread never blanks a field. */
function pickDefined<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {}
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) out[key] = value[key]
  }
  return out
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value
}
