// src/index.ts — switchboard entry point
// Boot sequence: config → cache mirror → relay → probes → gateway → serve

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { createApp } from "./gateway/server.js"
import { createRelay } from "./relay/index.js"
import { createRelayLogger, errorMessage } from "./relay/logger.js"
import { RedisCacheMirror } from "./relay/redis/cache-mirror.js"
import { RedisConnection } from "./relay/redis/client.js"
import { createIoredisFactory } from "./relay/redis/ioredis-factory.js"
import type { SettingsChange } from "./relay/settings.js"

async function main() {
  const bootStart = Date.now()
  console.log("[switchboard] booting...")

  // 1. Load config
  const config = loadConfig()
  const logger = createRelayLogger(config.logLevel)
  const providerNames = Object.keys(config.providers).join(",")
  console.log(`[switchboard] config loaded: providers=${providerNames}, port=${config.port}`)

  // 2. Optional cache mirror
  let redis: RedisConnection | undefined
  let mirror: RedisCacheMirror | undefined
  if (config.redis) {
    const factory = await createIoredisFactory(logger.child("redis"))
    redis = new RedisConnection(factory.createCommandClient(config.redis))
    mirror = new RedisCacheMirror(redis.client, config.redis.keyPrefix)
    console.log(`[switchboard] cache mirror: redis (prefix=${config.redis.keyPrefix})`)
  }

  // 3. Relay
  const relay = createRelay(config, { logger, mirror })
  relay.settings.on("change", (change: SettingsChange) => {
    logger.info("settings replaced", { from: change.from, to: change.to })
  })
  console.log(`[switchboard] settings v${relay.settings.current().version}, order=${relay.settings.current().providerOrder.join(">")}`)

  // 4. Health probes (independent of traffic)
  relay.health.start()
  void relay.health.probeAll()

  // 5. Gateway
  const app = createApp(config, {
    orchestrator: relay.orchestrator,
    settings: relay.settings,
    metrics: relay.metrics,
    cache: relay.cache,
    registry: relay.registry,
    logger,
    healthExtras: redis ? () => ({ redis: redis?.state }) : undefined,
  })

  const bootDuration = Date.now() - bootStart
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[switchboard] ready on :${info.port} (boot: ${bootDuration}ms)`)
  })

  // 6. Graceful shutdown: stop inbound, stop probes, close the mirror
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    console.log(`[switchboard] ${signal} received, shutting down...`)

    await new Promise<void>((resolve) => server.close(() => resolve()))
    relay.health.stop()
    if (redis) {
      try {
        await redis.close()
      } catch (err) {
        console.error("[switchboard] redis close error:", errorMessage(err))
      }
    }

    console.log(`[switchboard] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    setTimeout(() => {
      console.error("[switchboard] forced shutdown after 30s timeout")
      process.exit(1)
    }, 30_000).unref()

    void gracefulShutdown(signal)
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[switchboard] fatal:", err)
  process.exit(1)
})
