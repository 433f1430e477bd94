// src/gateway/metrics-endpoint.ts — Prometheus exposition route

import { Hono } from "hono"
import type { MetricRegistry } from "../relay/metrics.js"
import { bearerAuth } from "./auth.js"

export function metricsRoutes(registry: MetricRegistry, bearerToken: string): Hono {
  const app = new Hono()

  app.use("*", bearerAuth(bearerToken, "open"))

  app.get("/", (c) => {
    c.header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
    return c.text(registry.serialize())
  })

  return app
}
