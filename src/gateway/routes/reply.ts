// src/gateway/routes/reply.ts — POST /api/v1/reply
// Thin wrapper over Orchestrator.generateReply. The client's disconnect
// signal cancels the call.

import type { Context } from "hono"
import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { RelayLogger } from "../../relay/logger.js"
import type { Orchestrator } from "../../relay/orchestrator.js"
import type { ChatMessage } from "../../relay/types.js"
import { errorResponse } from "../errors.js"

export const ReplyRequestSchema = Type.Object({
  callerId: Type.String({ minLength: 1 }),
  peerId: Type.String({ minLength: 1 }),
  userText: Type.String({ minLength: 1 }),
  systemPrompt: Type.Optional(Type.String()),
  provider: Type.Optional(
    Type.Union([Type.Literal("auto"), Type.Literal("openrouter"), Type.Literal("aitunnel")]),
  ),
  history: Type.Optional(
    Type.Array(
      Type.Object({
        role: Type.Union([Type.Literal("system"), Type.Literal("user"), Type.Literal("assistant")]),
        text: Type.String(),
        timestamp: Type.Optional(Type.Number()),
      }),
    ),
  ),
})

export function createReplyHandler(orchestrator: Orchestrator, log: RelayLogger) {
  return async (c: Context) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json({ error: "Invalid JSON body", code: "INVALID_REQUEST" }, 400)
    }

    if (!Value.Check(ReplyRequestSchema, body)) {
      const first = Value.Errors(ReplyRequestSchema, body).First()
      return c.json(
        { error: `${first?.path ?? "/"}: ${first?.message ?? "invalid request"}`, code: "INVALID_REQUEST" },
        400,
      )
    }

    const history: ChatMessage[] = (body.history ?? []).map((m) => ({
      role: m.role,
      text: m.text,
      timestamp: m.timestamp ?? 0,
    }))

    try {
      const result = await orchestrator.generateReply({
        callerId: body.callerId,
        peerId: body.peerId,
        systemPrompt: body.systemPrompt ?? "",
        history,
        userText: body.userText,
        providerPreference: body.provider ?? "auto",
        signal: c.req.raw.signal,
      })
      return c.json({ reply: result.reply, metadata: result.metadata })
    } catch (err) {
      return errorResponse(c, err, log)
    }
  }
}
