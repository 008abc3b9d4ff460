import type { CacheRecord } from "../../ports/cache-record"
import type { CacheTtl } from "../../ports/cache-ttl"
import type { EpochSeconds, Milliseconds, Seconds } from "../../ports/time"
import { InvalidArgumentError } from "../errors/cache-error"

export function toEpochSeconds(ms: Milliseconds): EpochSeconds {
  return Math.floor(ms / 1000)
}

/**
 * Length of a TTL in (possibly fractional, possibly negative) seconds,
 * measured from `nowMs`.
 *
 * @throws {InvalidArgumentError} when the TTL is `NaN` or infinite, which
 * includes an `until` TTL holding an invalid date.
 */
export function ttlToSeconds(ttl: CacheTtl, nowMs: Milliseconds): Seconds {
  const seconds = rawSeconds(ttl, nowMs)

  if (!Number.isFinite(seconds)) {
    throw new InvalidArgumentError("TTL must be a finite number of seconds", {
      ttl: String(seconds),
    })
  }

  return seconds
}

function rawSeconds(ttl: CacheTtl, nowMs: Milliseconds): number {
  if (typeof ttl === "number") return ttl
  if (ttl.kind === "seconds") return ttl.seconds
  if (ttl.kind === "milliseconds") return ttl.milliseconds / 1000

  return (ttl.expiresAt.getTime() - nowMs) / 1000
}

/**
 * Absolute expiry for a record written at `nowMs`, or `null` (never expires)
 * when no TTL is given.
 *
 * @remarks
 * Zero and negative TTLs are accepted and yield an expiry at or before now,
 * so the next read past that second treats the record as expired.
 *
 * @throws {InvalidArgumentError} when the TTL is not finite or the expiry
 * falls outside the safe integer range, so nothing unreadable gets written.
 */
export function absoluteExpiry(
  ttl: CacheTtl | null | undefined,
  nowMs: Milliseconds,
): EpochSeconds | null {
  if (ttl === undefined || ttl === null) return null

  const expiresAt = toEpochSeconds(nowMs) + Math.floor(ttlToSeconds(ttl, nowMs))

  if (!Number.isSafeInteger(expiresAt)) {
    throw new InvalidArgumentError("TTL puts the expiry out of range", { expiresAt })
  }

  return expiresAt
}

/**
 * A record is live while its expiry second has not passed. The expiry second
 * itself still counts as live.
 */
export function isLive(record: CacheRecord<unknown>, nowMs: Milliseconds): boolean {
  return record.expiresAt === null || record.expiresAt >= toEpochSeconds(nowMs)
}

/**
 * Whole-second TTL for remote servers, never below one second. A TTL that
 * rounds to zero or below is clamped up rather than treated as expired.
 */
export function clampRemoteTtl(ttl: CacheTtl, nowMs: Milliseconds): Seconds {
  return Math.max(1, Math.trunc(ttlToSeconds(ttl, nowMs)))
}
