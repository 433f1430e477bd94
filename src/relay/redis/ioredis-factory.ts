// src/relay/redis/ioredis-factory.ts — ioredis adapter
//
// Bridges the RedisClientFactory port with ioredis. Loaded with a dynamic
// import so processes without REDIS_URL never pull the library in.

import type { RelayLogger } from "../logger.js"
import { errorMessage } from "../logger.js"
import type { RedisClientFactory, RedisCommandClient, RedisConfig } from "./client.js"

export async function createIoredisFactory(logger: RelayLogger): Promise<RedisClientFactory> {
  const { Redis } = await import("ioredis")

  return {
    createCommandClient(config: RedisConfig): RedisCommandClient {
      const client = new Redis(config.url, {
        connectTimeout: config.connectTimeoutMs,
        commandTimeout: config.commandTimeoutMs,
        maxRetriesPerRequest: config.maxRetriesPerRequest,
        enableOfflineQueue: false,
        lazyConnect: true,
      })

      client.on("error", (err: unknown) => {
        logger.warn("redis error", { error: errorMessage(err) })
      })

      // lazyConnect: start connecting now, in the background
      client.connect().catch((err: unknown) => {
        logger.warn("redis initial connection failed", { error: errorMessage(err) })
      })

      return client
    },
  }
}
