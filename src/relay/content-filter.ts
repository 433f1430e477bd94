// src/relay/content-filter.ts — Pre/post content screening pipeline
//
// Two checkpoints: "input" (user text, before any backend spend) and
// "output" (generated reply, before caching or returning). Each runs the
// same ordered list of independent rules. A rejection short-circuits;
// a redaction rewrites the matched spans and the pipeline continues.

import { readFileSync } from "node:fs"
import { resolve } from "node:path"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { RelayError } from "./errors.js"

// --- Rule contract ---

export type FilterStage = "input" | "output"

export type RuleVerdict =
  | { action: "allow" }
  | { action: "reject"; reason: string }
  | { action: "redact"; text: string; note: string }

export interface ContentRule {
  readonly name: string
  readonly stages: readonly FilterStage[]
  evaluate(text: string, stage: FilterStage): RuleVerdict
}

const BOTH_STAGES: readonly FilterStage[] = ["input", "output"]

/** Regex source matching `term` as a whole word in any script. */
function wholeWord(term: string): string {
  const escaped = term.replace(/[.*+?^${}()|[\]\\]/g, "\\$&").replace(/\s+/g, "\\s+")
  return `(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`
}

// --- Rules ---

/** Rejects text containing any banned keyword (case-insensitive, whole word). */
export class KeywordRule implements ContentRule {
  private readonly patterns: Array<{ keyword: string; re: RegExp }>

  constructor(
    readonly name: string,
    keywords: readonly string[],
    readonly stages: readonly FilterStage[] = BOTH_STAGES,
  ) {
    this.patterns = keywords.map((keyword) => ({ keyword, re: new RegExp(wholeWord(keyword), "iu") }))
  }

  evaluate(text: string): RuleVerdict {
    for (const { keyword, re } of this.patterns) {
      if (re.test(text)) return { action: "reject", reason: `banned keyword "${keyword}"` }
    }
    return { action: "allow" }
  }
}

/** Rejects text matching any banned regular expression. */
export class PatternRule implements ContentRule {
  constructor(
    readonly name: string,
    private readonly patterns: readonly RegExp[],
    readonly stages: readonly FilterStage[] = BOTH_STAGES,
  ) {}

  evaluate(text: string): RuleVerdict {
    for (const re of this.patterns) {
      re.lastIndex = 0
      if (re.test(text)) return { action: "reject", reason: `matched pattern ${re.source}` }
    }
    return { action: "allow" }
  }
}

export interface RedactionPattern {
  name: string
  pattern: RegExp
  replacement: string
}

/** Masks personal data (phone, card, e-mail) instead of rejecting. */
export class PiiRedactionRule implements ContentRule {
  constructor(
    readonly name: string,
    private readonly patterns: readonly RedactionPattern[],
    readonly stages: readonly FilterStage[] = BOTH_STAGES,
  ) {
    for (const p of patterns) {
      if (!p.pattern.global) {
        throw new Error(`RedactionPattern "${p.name}" must have the global flag`)
      }
    }
  }

  evaluate(text: string): RuleVerdict {
    let result = text
    const hits: string[] = []
    for (const p of this.patterns) {
      p.pattern.lastIndex = 0
      const replaced = result.replace(p.pattern, p.replacement)
      if (replaced !== result) hits.push(p.name)
      result = replaced
    }
    if (hits.length === 0) return { action: "allow" }
    return { action: "redact", text: result, note: `${this.name}:${hits.join(",")}` }
  }
}

/**
 * Weighted lexicon scoring. Every whole-word occurrence adds the term's
 * weight; reaching the threshold rejects.
 */
export class ToxicityScoreRule implements ContentRule {
  private readonly terms: Array<{ term: string; weight: number; re: RegExp }>

  constructor(
    readonly name: string,
    weights: Readonly<Record<string, number>>,
    private readonly threshold: number,
    readonly stages: readonly FilterStage[] = BOTH_STAGES,
  ) {
    this.terms = Object.entries(weights).map(([term, weight]) => ({
      term,
      weight,
      re: new RegExp(wholeWord(term), "giu"),
    }))
  }

  score(text: string): number {
    let total = 0
    for (const { weight, re } of this.terms) {
      const matches = text.match(re)
      if (matches) total += weight * matches.length
    }
    return Math.round(total * 1000) / 1000
  }

  evaluate(text: string): RuleVerdict {
    const score = this.score(text)
    if (score >= this.threshold) {
      return { action: "reject", reason: `toxicity score ${score} >= ${this.threshold}` }
    }
    return { action: "allow" }
  }
}

// --- Pipeline ---

export interface FilterResult {
  text: string
  /** Notes from redaction rules that fired, in pipeline order */
  redactions: string[]
}

export class ContentFilter {
  constructor(private readonly rules: readonly ContentRule[]) {}

  /**
   * Run every rule registered for `stage`.
   * Throws CONTENT_REJECTED on the first rejection.
   */
  check(text: string, stage: FilterStage): FilterResult {
    let current = text
    const redactions: string[] = []
    for (const rule of this.rules) {
      if (!rule.stages.includes(stage)) continue
      const verdict = rule.evaluate(current, stage)
      if (verdict.action === "reject") {
        throw new RelayError("CONTENT_REJECTED", `${stage} blocked by ${rule.name}`, {
          stage,
          rule: rule.name,
          reason: verdict.reason,
        })
      }
      if (verdict.action === "redact") {
        current = verdict.text
        redactions.push(verdict.note)
      }
    }
    return { text: current, redactions }
  }
}

// --- Rule file ---

export const ContentRulesSchema = Type.Object({
  bannedKeywords: Type.Array(Type.String({ minLength: 1 })),
  bannedPatterns: Type.Array(Type.String({ minLength: 1 })),
  toxicity: Type.Object({
    threshold: Type.Number({ exclusiveMinimum: 0 }),
    terms: Type.Record(Type.String(), Type.Number({ minimum: 0 })),
  }),
  pii: Type.Array(
    Type.Object({
      name: Type.String({ minLength: 1 }),
      pattern: Type.String({ minLength: 1 }),
      replacement: Type.String(),
    }),
  ),
})

export type ContentRulesFile = Static<typeof ContentRulesSchema>

export const DEFAULT_CONTENT_RULES_PATH = "config/content-rules.json"

/** Build the standard rule pipeline from a validated rules document. */
export function buildContentFilter(rules: ContentRulesFile): ContentFilter {
  return new ContentFilter([
    new KeywordRule("keywords", rules.bannedKeywords),
    new PatternRule("patterns", rules.bannedPatterns.map((p) => new RegExp(p, "iu"))),
    new ToxicityScoreRule("toxicity", rules.toxicity.terms, rules.toxicity.threshold),
    new PiiRedactionRule(
      "pii",
      rules.pii.map((p) => ({ name: p.name, pattern: new RegExp(p.pattern, "g"), replacement: p.replacement })),
    ),
  ])
}

/** Load and validate a rules file (path relative to the working directory). */
export function loadContentRules(path: string = DEFAULT_CONTENT_RULES_PATH): ContentRulesFile {
  const raw: unknown = JSON.parse(readFileSync(resolve(path), "utf-8"))
  if (!Value.Check(ContentRulesSchema, raw)) {
    const first = Value.Errors(ContentRulesSchema, raw).First()
    throw new RelayError("CONFIG_INVALID", `content rules at ${path} are invalid`, {
      path: first?.path,
      detail: first?.message,
    })
  }
  return raw
}
