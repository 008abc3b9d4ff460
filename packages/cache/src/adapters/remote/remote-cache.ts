import { createSuperjsonCodec } from "../../core/codec/superjson-codec"
import { clampRemoteTtl } from "../../core/time/expiration"
import { SystemClock } from "../../core/time/system-clock"
import { toBatch, validateKey, validateKeys } from "../../core/validation/validate-key"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheTtl } from "../../ports/cache-ttl"
import type { Clock } from "../../ports/clock"
import type { Logger } from "../../ports/logger"
import type { RemoteAck, RemoteSetCommand, RemoteStore } from "../../ports/remote-store"
import type { SimpleCache } from "../../ports/simple-cache"
import type { StringCodec } from "../../ports/string-codec"
import { NullLogger } from "../logger/null-logger"

export type RemoteCacheDeps<T> = {
  store: RemoteStore
  codec?: StringCodec<T>
  clock?: Clock
  logger?: Logger
}

const isOk = (ack: RemoteAck): boolean => ack === "OK"

/**
 * Cache facade over a {@link RemoteStore}. Expiry is delegated to the server;
 * values travel as strings produced by a {@link StringCodec} (superjson by
 * default).
 *
 * @remarks
 * - A TTL, when given, is sent as whole seconds and never below one second.
 * - `setMultiple` sends every write in one pipeline and reports `false` if
 *   any write was not acknowledged with `"OK"`.
 * - `deleteMultiple` reports whether at least one key was removed.
 * - `clear` flushes the whole server, not only keys written by this cache.
 */
export class RemoteCache<T> implements SimpleCache<T> {
  private readonly store: RemoteStore
  private readonly codec: StringCodec<T>
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(deps: RemoteCacheDeps<T>) {
    this.store = deps.store
    this.codec = deps.codec ?? createSuperjsonCodec<T>()
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "cache",
      backend: "remote",
    })
  }

  async get(key: CacheKey, defaultValue: T | null = null): Promise<T | null> {
    validateKey(key)

    const payload = await this.store.get(key)
    if (payload === null) return defaultValue

    return this.codec.decode(payload)
  }

  async set(key: CacheKey, value: T, ttl?: CacheTtl): Promise<boolean> {
    validateKey(key)

    const ack = await this.store.set(key, this.codec.encode(value), this.toSeconds(ttl))

    if (!isOk(ack)) this.logger.warn("cache write not acknowledged", { key, ack })

    return isOk(ack)
  }

  async delete(key: CacheKey): Promise<boolean> {
    validateKey(key)

    return (await this.store.del([key])) > 0
  }

  async clear(): Promise<boolean> {
    return isOk(await this.store.flushAll())
  }

  async has(key: CacheKey): Promise<boolean> {
    validateKey(key)

    return this.store.exists(key)
  }

  async getMultiple(
    keys: Iterable<CacheKey>,
    defaultValue: T | null = null,
  ): Promise<Map<CacheKey, T | null>> {
    const batch = toBatch(keys, "Keys")
    validateKeys(batch)

    const out = new Map<CacheKey, T | null>()
    if (batch.length === 0) return out

    const payloads = await this.store.mget(batch)

    for (const [i, key] of batch.entries()) {
      const payload = payloads[i] ?? null
      out.set(key, payload === null ? defaultValue : this.codec.decode(payload))
    }

    return out
  }

  async setMultiple(entries: Iterable<CacheEntry<T>>, ttl?: CacheTtl): Promise<boolean> {
    const batch = toBatch(entries, "Values")
    validateKeys(batch.map(([key]) => key))

    if (batch.length === 0) return true

    const ttlSeconds = this.toSeconds(ttl)
    const commands = batch.map(
      ([key, value]): RemoteSetCommand => ({
        key,
        value: this.codec.encode(value),
        ...(ttlSeconds !== undefined && { ttlSeconds }),
      }),
    )

    const acks = await this.store.pipelineSet(commands)
    const failed = acks.filter((ack) => !isOk(ack)).length

    if (failed > 0) {
      this.logger.warn("cache batch write not acknowledged", {
        failed,
        total: commands.length,
      })
    }

    return failed === 0 && acks.length === commands.length
  }

  async deleteMultiple(keys: Iterable<CacheKey>): Promise<boolean> {
    const batch = toBatch(keys, "Keys")
    validateKeys(batch)

    if (batch.length === 0) return false

    return (await this.store.del(batch)) > 0
  }

  private toSeconds(ttl: CacheTtl | undefined): number | undefined {
    if (ttl === undefined) return undefined

    return clampRemoteTtl(ttl, this.clock.nowMs())
  }
}
