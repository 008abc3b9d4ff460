import type { EpochSeconds } from "./time"

/**
 * The unit persisted by file-backed caches: the cached value plus its
 * absolute expiry. `expiresAt: null` means the record never expires.
 */
export type CacheRecord<T> = {
  value: T
  expiresAt: EpochSeconds | null
}
