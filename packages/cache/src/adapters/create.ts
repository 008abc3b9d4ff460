import { BinaryRecordCodec } from "../core/codec/binary-record-codec"
import { JsonRecordCodec } from "../core/codec/json-record-codec"
import { SystemClock } from "../core/time/system-clock"
import type { Clock } from "../ports/clock"
import type { JsonValue } from "../ports/json-value"
import type { KeyspacePrefix } from "../ports/keyspace-prefix"
import type { Logger } from "../ports/logger"
import type { RemoteStore } from "../ports/remote-store"
import type { StringCodec } from "../ports/string-codec"
import { FileCache } from "./fs/file-cache"
import { MemoryCache } from "./memory/memory-cache"
import type { RedisStringClient } from "./redis/redis-client"
import { RedisRemoteStore } from "./redis/redis-remote-store"
import { RemoteCache } from "./remote/remote-cache"

export type CacheFactoryDeps = {
  clock?: Clock
  logger?: Logger
}

export function createMemoryCache<T>(): MemoryCache<T> {
  return new MemoryCache<T>()
}

/**
 * File cache storing each record in Node's structured binary format.
 * Accepts any value `node:v8` can serialize.
 */
export async function createFileCache<T>(
  options: { rootDir: string } & CacheFactoryDeps,
): Promise<FileCache<T>> {
  return FileCache.open(
    {
      codec: new BinaryRecordCodec<T>(),
      clock: options.clock ?? new SystemClock(),
      ...(options.logger && { logger: options.logger }),
    },
    { rootDir: options.rootDir },
  )
}

/**
 * File cache storing each record as a `.json` file. Values are limited to
 * what JSON can represent.
 */
export async function createJsonFileCache<T extends JsonValue = JsonValue>(
  options: { rootDir: string } & CacheFactoryDeps,
): Promise<FileCache<T>> {
  return FileCache.open(
    {
      codec: new JsonRecordCodec<T>(),
      clock: options.clock ?? new SystemClock(),
      ...(options.logger && { logger: options.logger }),
    },
    { rootDir: options.rootDir },
  )
}

export function createRemoteCache<T>(
  options: { store: RemoteStore; codec?: StringCodec<T> } & CacheFactoryDeps,
): RemoteCache<T> {
  return new RemoteCache<T>(options)
}

/**
 * Remote cache over a node-redis client.
 *
 * @remarks
 * Caller owns `client.connect()` / `client.quit()`.
 */
export function createRedisCache<T>(
  options: {
    client: RedisStringClient
    keyspacePrefix?: KeyspacePrefix
    codec?: StringCodec<T>
  } & CacheFactoryDeps,
): RemoteCache<T> {
  const { client, keyspacePrefix, ...rest } = options
  const store = new RedisRemoteStore(client, { keyspacePrefix: keyspacePrefix ?? "" })

  return new RemoteCache<T>({ ...rest, store })
}
