// src/relay/history.ts — Conversation history compression and reply clamping
//
// Pure functions: identical input always yields identical output, which keeps
// cache fingerprints stable. The caller's history is never mutated.

import type { ChatMessage } from "./types.js"

/** Rough token estimate used for budgeting. */
export const CHARS_PER_TOKEN = 4

/** Characters kept per collapsed message in the summary line. */
const SUMMARY_CLIP_CHARS = 80

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}

export interface HistoryBudget {
  maxMessages: number
  maxTokens: number
}

/**
 * Fit history into the budget. Recent messages are kept verbatim; older ones
 * collapse into a single synthetic system message placed first. The summary
 * occupies one message slot, so at most `maxMessages - 1` messages stay verbatim
 * once compression kicks in. The summary gets whatever token budget the
 * verbatim tail leaves: its oldest lines drop first, and it is omitted when
 * not even its header fits.
 */
export function summarizeHistory(history: readonly ChatMessage[], budget: HistoryBudget): ChatMessage[] {
  const totalTokens = history.reduce((sum, m) => sum + estimateTokens(m.text), 0)
  if (history.length <= budget.maxMessages && totalTokens <= budget.maxTokens) {
    return history.map((m) => ({ ...m }))
  }

  const verbatimSlots = Math.max(0, budget.maxMessages - 1)
  const kept: ChatMessage[] = []
  let usedTokens = 0
  for (let i = history.length - 1; i >= 0 && kept.length < verbatimSlots; i--) {
    const cost = estimateTokens(history[i].text)
    // Always keep the newest message, even when it alone exceeds the budget
    if (kept.length > 0 && usedTokens + cost > budget.maxTokens) break
    kept.unshift({ ...history[i] })
    usedTokens += cost
  }

  const collapsed = history.slice(0, history.length - kept.length)
  if (collapsed.length === 0) return kept

  const summary = buildSummary(collapsed, history.length, budget.maxTokens - usedTokens)
  return summary ? [summary, ...kept] : kept
}

function buildSummary(collapsed: readonly ChatMessage[], total: number, maxTokens: number): ChatMessage | null {
  const header = `Earlier conversation condensed (${collapsed.length} of ${total} messages):`
  const maxChars = maxTokens * CHARS_PER_TOKEN
  if (header.length > maxChars) return null

  // Newest collapsed turns are the most relevant; walk back until full
  const lines: string[] = []
  let length = header.length
  for (let i = collapsed.length - 1; i >= 0; i--) {
    const m = collapsed[i]
    const line = `${m.role}: ${clip(m.text.replace(/\s+/g, " ").trim(), SUMMARY_CLIP_CHARS)}`
    if (length + 1 + line.length > maxChars) break
    lines.unshift(line)
    length += 1 + line.length
  }

  return {
    role: "system",
    text: [header, ...lines].join("\n"),
    timestamp: collapsed[collapsed.length - 1].timestamp,
  }
}

function clip(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`
}

/**
 * Trim a reply to `maxChars`: whole sentences first, then whole words,
 * with "..." appended when anything was cut.
 */
export function clampReply(text: string, maxChars: number): string {
  const t = text.trim()
  if (t.length <= maxChars) return t

  let result = ""
  for (const sentence of t.split(". ")) {
    const next = `${result}${sentence}. `
    if (next.length > maxChars) break
    result = next
  }

  if (!result) {
    for (const word of t.split(/\s+/)) {
      const next = `${result}${word} `
      if (next.length > maxChars) break
      result = next
    }
  }

  result = result.trim()
  if (!result) result = t.slice(0, maxChars)
  return result.length < t.length ? `${result}...` : result
}
