import { toBatch, validateKey, validateKeys } from "../../core/validation/validate-key"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheTtl } from "../../ports/cache-ttl"
import type { SimpleCache } from "../../ports/simple-cache"

/**
 * In-process cache backed by a single `Map` owned by the instance.
 *
 * @remarks
 * - TTLs are accepted and ignored; entries live until deleted or cleared.
 * - `deleteMultiple` reports `false` when any key was absent, unlike the
 *   file caches whose batch deletes always report `true`.
 * - No locking: safe only for single-threaded or externally synchronized use.
 */
export class MemoryCache<T> implements SimpleCache<T> {
  private readonly store = new Map<CacheKey, T>()

  async get(key: CacheKey, defaultValue: T | null = null): Promise<T | null> {
    validateKey(key)

    return this.store.has(key) ? (this.store.get(key) ?? null) : defaultValue
  }

  async set(key: CacheKey, value: T, _ttl?: CacheTtl): Promise<boolean> {
    validateKey(key)

    this.store.set(key, value)

    return true
  }

  async delete(key: CacheKey): Promise<boolean> {
    validateKey(key)

    return this.store.delete(key)
  }

  async clear(): Promise<boolean> {
    this.store.clear()

    return true
  }

  async has(key: CacheKey): Promise<boolean> {
    validateKey(key)

    return this.store.has(key)
  }

  async getMultiple(
    keys: Iterable<CacheKey>,
    defaultValue: T | null = null,
  ): Promise<Map<CacheKey, T | null>> {
    const batch = toBatch(keys, "Keys")
    validateKeys(batch)

    const out = new Map<CacheKey, T | null>()

    for (const key of batch) {
      out.set(key, await this.get(key, defaultValue))
    }

    return out
  }

  async setMultiple(entries: Iterable<CacheEntry<T>>, ttl?: CacheTtl): Promise<boolean> {
    const batch = toBatch(entries, "Values")
    validateKeys(batch.map(([key]) => key))

    for (const [key, value] of batch) {
      await this.set(key, value, ttl)
    }

    return true
  }

  async deleteMultiple(keys: Iterable<CacheKey>): Promise<boolean> {
    const batch = toBatch(keys, "Keys")
    validateKeys(batch)

    let success = true

    for (const key of batch) {
      if (!(await this.delete(key))) success = false
    }

    return success
  }
}
