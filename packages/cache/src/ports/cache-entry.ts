import type { CacheKey } from "./cache-key"

/**
 * A key–value pair used for bulk cache writes.
 *
 * A `Map<CacheKey, T>` is an `Iterable<CacheEntry<T>>`, so both maps and
 * arrays of tuples can be passed to `setMultiple`.
 */
export type CacheEntry<T> = readonly [CacheKey, T]
