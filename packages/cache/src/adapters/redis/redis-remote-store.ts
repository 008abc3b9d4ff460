import { MultiErrorReply } from "redis"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { RemoteAck, RemoteSetCommand, RemoteStore } from "../../ports/remote-store"
import type { Seconds } from "../../ports/time"
import type { RedisStringClient, RedisTtl } from "./redis-client"

export type RedisRemoteStoreOptions = {
  keyspacePrefix: KeyspacePrefix
}

export class RedisRemoteStore implements RemoteStore {
  constructor(
    private readonly client: RedisStringClient,
    private readonly opts: RedisRemoteStoreOptions = { keyspacePrefix: "" },
  ) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(this.fullKey(key))
  }

  async set(key: string, value: string, ttlSeconds?: Seconds): Promise<RemoteAck> {
    const fullKey = this.fullKey(key)

    if (ttlSeconds === undefined) return this.client.set(fullKey, value)

    return this.client.set(fullKey, value, this.toRedisTtl(ttlSeconds))
  }

  async del(keys: readonly string[]): Promise<number> {
    if (keys.length === 0) return 0

    return this.client.del(keys.map((k) => this.fullKey(k)))
  }

  async mget(keys: readonly string[]): Promise<(string | null)[]> {
    if (keys.length === 0) return []

    return this.client.mGet(keys.map((k) => this.fullKey(k)))
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(this.fullKey(key))) > 0
  }

  async flushAll(): Promise<RemoteAck> {
    return this.client.flushAll()
  }

  async pipelineSet(commands: readonly RemoteSetCommand[]): Promise<RemoteAck[]> {
    if (commands.length === 0) return []

    const pipeline = this.client.multi()

    for (const { key, value, ttlSeconds } of commands) {
      if (ttlSeconds === undefined) pipeline.set(this.fullKey(key), value)
      else pipeline.set(this.fullKey(key), value, this.toRedisTtl(ttlSeconds))
    }

    try {
      const replies = await pipeline.execAsPipeline()

      return replies.map(toAck)
    } catch (err) {
      // node-redis rejects the whole pipeline when any command got an error reply
      if (!(err instanceof MultiErrorReply)) throw err

      const failed = new Set(err.errorIndexes)

      return err.replies.map((reply, i) => (failed.has(i) ? null : toAck(reply)))
    }
  }

  private toRedisTtl(ttlSeconds: Seconds): RedisTtl {
    return { EX: ttlSeconds }
  }

  private fullKey(k: string): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}

function toAck(reply: unknown): RemoteAck {
  return typeof reply === "string" ? reply : null
}
