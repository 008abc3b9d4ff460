export type { CacheEntry } from "./ports/cache-entry"
export type { CacheKey } from "./ports/cache-key"
export type { CacheRecord } from "./ports/cache-record"
export type { CacheTtl, CacheTtlDuration } from "./ports/cache-ttl"
export type { Clock } from "./ports/clock"
export type { ConfigSource } from "./ports/config-source"
export type { JsonPrimitive, JsonValue } from "./ports/json-value"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type {
  LogBindings,
  LogContext,
  Logger,
  LoggerOptions,
  LogLevelName,
  LogMeta,
} from "./ports/logger"
export { logLevelNames } from "./ports/logger"
export type { RecordCodec } from "./ports/record-codec"
export type { RemoteAck, RemoteSetCommand, RemoteStore } from "./ports/remote-store"
export type { SimpleCache } from "./ports/simple-cache"
export type { StringCodec } from "./ports/string-codec"
export type { EpochSeconds, Milliseconds, Seconds } from "./ports/time"

export {
  CacheConfigError,
  CacheError,
  type CacheErrorCode,
  CorruptRecordError,
  InvalidArgumentError,
  InvalidKeyError,
  serializeCacheError,
} from "./core/errors/cache-error"
export { isCacheError } from "./core/errors/is-cache-error"
export { validateKey, validateKeys } from "./core/validation/validate-key"
export {
  absoluteExpiry,
  clampRemoteTtl,
  isLive,
  ttlToSeconds,
} from "./core/time/expiration"
export { SystemClock } from "./core/time/system-clock"
export { BinaryRecordCodec } from "./core/codec/binary-record-codec"
export { JsonRecordCodec } from "./core/codec/json-record-codec"
export { createSuperjsonCodec } from "./core/codec/superjson-codec"
export {
  type CacheConfig,
  type CacheDriver,
  cacheConfigSchema,
  cacheDrivers,
  loadCacheConfig,
} from "./core/config/cache-config"

export { FileCache, type FileCacheDeps, type FileCacheOptions } from "./adapters/fs/file-cache"
export { MemoryCache } from "./adapters/memory/memory-cache"
export { RemoteCache, type RemoteCacheDeps } from "./adapters/remote/remote-cache"
export {
  createRedisStringClient,
  type RedisStringClient,
  type RedisStringClientOptions,
} from "./adapters/redis/redis-client"
export { RedisRemoteStore, type RedisRemoteStoreOptions } from "./adapters/redis/redis-remote-store"
export { NullLogger, createNullLogger } from "./adapters/logger/null-logger"
export { PinoLogger, createPinoLogger, type PinoLoggerDeps } from "./adapters/logger/pino-logger"
export { EnvSource } from "./adapters/config/env-source"
export { DotenvSource } from "./adapters/config/dotenv-source"
export { ObjectSource } from "./adapters/config/object-source"
export {
  createFileCache,
  createJsonFileCache,
  createMemoryCache,
  createRedisCache,
  createRemoteCache,
} from "./adapters/create"
export {
  type CacheFromConfigDeps,
  type CacheHandle,
  createCacheFromConfig,
} from "./adapters/create-from-config"
