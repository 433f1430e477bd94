// src/gateway/routes/settings.ts — Runtime settings admin API

import { Hono } from "hono"
import type { RelayLogger } from "../../relay/logger.js"
import type { SettingsStore } from "../../relay/settings.js"
import { errorResponse } from "../errors.js"

export function settingsRoutes(store: SettingsStore, log: RelayLogger): Hono {
  const app = new Hono()

  app.get("/", (c) => c.json(store.current()))

  app.get("/export", (c) => {
    c.header("Content-Type", "application/json; charset=utf-8")
    c.header("Content-Disposition", 'attachment; filename="settings.json"')
    return c.body(store.exportJson())
  })

  app.put("/", async (c) => {
    try {
      const body: unknown = await c.req.json()
      return c.json(store.replace(body))
    } catch (err) {
      return settingsError(c, err, log)
    }
  })

  app.patch("/", async (c) => {
    try {
      const body: unknown = await c.req.json()
      return c.json(store.update(body))
    } catch (err) {
      return settingsError(c, err, log)
    }
  })

  app.post("/import", async (c) => {
    try {
      return c.json(store.importJson(await c.req.text()))
    } catch (err) {
      return settingsError(c, err, log)
    }
  })

  app.post("/reset", (c) => c.json(store.reset()))

  return app
}

function settingsError(c: Parameters<typeof errorResponse>[0], err: unknown, log: RelayLogger) {
  if (err instanceof SyntaxError) {
    return c.json({ error: "Invalid JSON body", code: "INVALID_REQUEST" }, 400)
  }
  return errorResponse(c, err, log)
}
