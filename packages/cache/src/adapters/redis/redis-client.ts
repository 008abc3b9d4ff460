import { createClient, type RedisClientOptions } from "redis"

export type RedisTtl = { EX: number }

/**
 * The slice of a node-redis client the cache talks to. String replies only:
 * values are already encoded by the cache's string codec.
 */
export type RedisStringClient = {
  get(key: string): Promise<string | null>
  mGet(keys: readonly string[]): Promise<(string | null)[]>

  set(key: string, value: string, opts?: RedisTtl): Promise<string | null>

  del(keys: string | readonly string[]): Promise<number>

  exists(keys: string | readonly string[]): Promise<number>

  flushAll(): Promise<string>

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean

  multi(): RedisStringPipeline
}

export type RedisStringPipeline = {
  set(key: string, value: string, opts?: RedisTtl): RedisStringPipeline
  execAsPipeline(): Promise<unknown[]>
}

export type RedisStringClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * Build an unconnected client. The caller owns `connect()` and `quit()`.
 */
export function createRedisStringClient(options: RedisStringClientOptions): RedisStringClient {
  return createClient({ ...options, url: options.url }) as unknown as RedisStringClient
}
