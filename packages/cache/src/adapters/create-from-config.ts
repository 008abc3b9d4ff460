import type { CacheConfig } from "../core/config/cache-config"
import type { Clock } from "../ports/clock"
import type { JsonValue } from "../ports/json-value"
import type { Logger } from "../ports/logger"
import type { RemoteStore } from "../ports/remote-store"
import type { SimpleCache } from "../ports/simple-cache"
import { createFileCache, createJsonFileCache, createMemoryCache } from "./create"
import { createPinoLogger } from "./logger/pino-logger"
import { createRedisStringClient } from "./redis/redis-client"
import { RedisRemoteStore } from "./redis/redis-remote-store"
import { RemoteCache } from "./remote/remote-cache"

export type CacheFromConfigDeps = {
  logger?: Logger
  clock?: Clock

  /**
   * Store used by the `redis` driver instead of a client built from
   * `REDIS_URL`. The cache does not own an injected store.
   *
   * `config.keyspacePrefix` is not applied to an injected store; prefix keys
   * inside the store itself (e.g. `new RedisRemoteStore(client, { keyspacePrefix })`).
   */
  remoteStore?: RemoteStore
}

export type CacheHandle = {
  cache: SimpleCache<JsonValue>

  /** Releases what the factory opened (the Redis connection, if any). */
  close(): Promise<void>
}

/**
 * Build the backend selected by `config.driver`.
 *
 * @remarks
 * Without an injected logger, a pino logger is created from `config.log`.
 */
export async function createCacheFromConfig(
  config: CacheConfig,
  deps: CacheFromConfigDeps = {},
): Promise<CacheHandle> {
  const logger = deps.logger ?? createPinoLogger(config.log)
  const shared = { logger, ...(deps.clock && { clock: deps.clock }) }

  switch (config.driver) {
    case "memory":
      return withoutResources(createMemoryCache<JsonValue>())

    case "file":
      return withoutResources(
        await createFileCache<JsonValue>({ rootDir: config.dir, ...shared }),
      )

    case "json":
      return withoutResources(await createJsonFileCache({ rootDir: config.dir, ...shared }))

    case "redis": {
      if (deps.remoteStore) {
        return withoutResources(
          new RemoteCache<JsonValue>({ store: deps.remoteStore, ...shared }),
        )
      }

      const client = createRedisStringClient({ url: config.redisUrl })
      await client.connect()

      logger.info("redis cache connected", { backend: "remote" })

      const store = new RedisRemoteStore(client, { keyspacePrefix: config.keyspacePrefix })

      return {
        cache: new RemoteCache<JsonValue>({ store, ...shared }),
        close: async () => {
          await client.quit()
        },
      }
    }
  }
}

function withoutResources(cache: SimpleCache<JsonValue>): CacheHandle {
  return { cache, close: async () => {} }
}
