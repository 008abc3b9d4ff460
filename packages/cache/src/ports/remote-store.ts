import type { Seconds } from "./time"

/**
 * Reply to a remote write. Success is exactly the status `"OK"`; anything
 * else (another status, `null`, an error reply) is a failure.
 */
export type RemoteAck = string | null

export type RemoteSetCommand = Readonly<{
  key: string
  value: string
  ttlSeconds?: Seconds
}>

/**
 * RemoteStore is the narrow capability a remote key-value server (Redis or
 * compatible) exposes to {@link RemoteCache}.
 *
 * @remarks
 * Connection management, timeouts and the wire protocol belong to the
 * implementation. The cache issues only the operations below.
 */
export interface RemoteStore {
  /** `GET key`; `null` when the key does not exist. */
  get(key: string): Promise<string | null>

  /** `SET key value [EX ttlSeconds]`. */
  set(key: string, value: string, ttlSeconds?: Seconds): Promise<RemoteAck>

  /** `DEL key...`; resolves to the number of keys removed. */
  del(keys: readonly string[]): Promise<number>

  /** `MGET key...`; values are aligned to the input order. */
  mget(keys: readonly string[]): Promise<(string | null)[]>

  /** `EXISTS key`. */
  exists(key: string): Promise<boolean>

  /** `FLUSHALL`. */
  flushAll(): Promise<RemoteAck>

  /** Several `SET`s sent in one round trip; one ack per command, in order. */
  pipelineSet(commands: readonly RemoteSetCommand[]): Promise<RemoteAck[]>
}
