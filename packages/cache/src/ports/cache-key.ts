/**
 * CacheKey is a plain, non-empty string owned by the caller.
 *
 * @remarks
 * File-backed caches never persist the key itself. They store each entry
 * under a fixed-length digest of the raw key, so any string is a valid
 * locator as long as it is not empty.
 *
 * @example
 * ```ts
 * const key: CacheKey = "users.by-id:v1:123"
 * ```
 */
export type CacheKey = string
