import { z } from "zod"
import { EnvSource } from "../../adapters/config/env-source"
import type { ConfigSource } from "../../ports/config-source"
import { type LoggerOptions, logLevelNames } from "../../ports/logger"
import { CacheConfigError } from "../errors/cache-error"

export const cacheDrivers = ["memory", "file", "json", "redis"] as const

export type CacheDriver = (typeof cacheDrivers)[number]

export type CacheConfig =
  | { driver: "memory"; log: Required<LoggerOptions> }
  | { driver: "file" | "json"; dir: string; log: Required<LoggerOptions> }
  | {
      driver: "redis"
      redisUrl: string
      keyspacePrefix: string
      log: Required<LoggerOptions>
    }

const rawSchema = z.object({
  CACHE_DRIVER: z.enum(cacheDrivers).default("memory"),
  CACHE_DIR: z.string().min(1).optional(),
  REDIS_URL: z.url().optional(),
  CACHE_KEYSPACE_PREFIX: z.string().default(""),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
})

export const cacheConfigSchema = rawSchema.transform((raw, ctx): CacheConfig => {
  const log = { level: raw.LOG_LEVEL, prettify: raw.LOG_PRETTY }

  switch (raw.CACHE_DRIVER) {
    case "memory":
      return { driver: "memory", log }

    case "file":
    case "json":
      if (raw.CACHE_DIR === undefined) {
        ctx.issues.push({
          code: "custom",
          message: `CACHE_DIR is required when CACHE_DRIVER is "${raw.CACHE_DRIVER}"`,
          path: ["CACHE_DIR"],
          input: raw,
        })

        return z.NEVER
      }

      return { driver: raw.CACHE_DRIVER, dir: raw.CACHE_DIR, log }

    case "redis":
      if (raw.REDIS_URL === undefined) {
        ctx.issues.push({
          code: "custom",
          message: 'REDIS_URL is required when CACHE_DRIVER is "redis"',
          path: ["REDIS_URL"],
          input: raw,
        })

        return z.NEVER
      }

      return {
        driver: "redis",
        redisUrl: raw.REDIS_URL,
        keyspacePrefix: raw.CACHE_KEYSPACE_PREFIX,
        log,
      }
  }
})

export type LoadCacheConfigOptions = {
  /** Defaults to the process environment. */
  sources?: ConfigSource[]
}

/**
 * Merge `sources` in order (later wins) and validate the result.
 *
 * @throws {CacheConfigError} when the merged values do not describe a valid
 * cache configuration.
 */
export async function loadCacheConfig({
  sources,
}: LoadCacheConfigOptions = {}): Promise<CacheConfig> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = cacheConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new CacheConfigError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { sources: [...new Set(Object.values(provenance))] },
    )
  }

  return result.data
}
