import { mkdir, readdir, rmdir, unlink } from "node:fs/promises"
import * as path from "node:path"
import { absoluteExpiry, isLive } from "../../core/time/expiration"
import { toBatch, validateKey, validateKeys } from "../../core/validation/validate-key"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheTtl } from "../../ports/cache-ttl"
import type { Clock } from "../../ports/clock"
import type { Logger } from "../../ports/logger"
import type { RecordCodec } from "../../ports/record-codec"
import type { SimpleCache } from "../../ports/simple-cache"
import { NullLogger } from "../logger/null-logger"
import {
  digestKey,
  isNotFoundError,
  isTempFileFor,
  readFileIfExists,
  writeFileExclusive,
} from "./fs-utils"

export type FileCacheDeps<T> = {
  codec: RecordCodec<T>
  clock: Clock
  logger?: Logger
}

export interface FileCacheOptions {
  /**
   * Directory holding one file per key. Created (with parents) when the
   * cache is opened.
   */
  rootDir: string
}

/**
 * File-backed cache storing each entry as one file named by the MD5 digest of
 * its key, with the record encoded by the injected {@link RecordCodec}.
 *
 * @remarks
 * - Expired entries are removed lazily, when a read finds them.
 * - A file that does not decode surfaces `CorruptRecordError` from `get`
 *   and `has`; it is never treated as a miss.
 * - Batch writes and deletes are best-effort: each entry is applied on its
 *   own and the batch reports `true` regardless of individual outcomes.
 * - The instance assumes it is the only writer in its root directory.
 */
export class FileCache<T> implements SimpleCache<T> {
  private readonly logger: Logger

  private constructor(
    private readonly deps: FileCacheDeps<T>,
    readonly rootDir: string,
  ) {
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "cache",
      backend: `file:${deps.codec.name}`,
    })
  }

  /**
   * Create the root directory if needed and return a cache bound to it.
   * Directory creation failures propagate unchanged.
   */
  static async open<T>(deps: FileCacheDeps<T>, opts: FileCacheOptions): Promise<FileCache<T>> {
    const rootDir = path.resolve(opts.rootDir)
    await mkdir(rootDir, { recursive: true })

    return new FileCache(deps, rootDir)
  }

  async get(key: CacheKey, defaultValue: T | null = null): Promise<T | null> {
    validateKey(key)

    const bytes = await readFileIfExists(this.filePathFor(key))
    if (bytes === null) return defaultValue

    const record = this.deps.codec.decode(bytes)

    if (isLive(record, this.deps.clock.nowMs())) return record.value

    this.logger.debug("cache entry expired", {
      digest: digestKey(key),
      expiresAt: record.expiresAt,
    })
    await this.delete(key)

    return defaultValue
  }

  async set(key: CacheKey, value: T, ttl?: CacheTtl): Promise<boolean> {
    validateKey(key)

    const bytes = this.deps.codec.encode({
      value,
      expiresAt: absoluteExpiry(ttl, this.deps.clock.nowMs()),
    })

    try {
      return await writeFileExclusive(this.filePathFor(key), bytes)
    } catch (err) {
      this.logger.warn("cache write failed", { digest: digestKey(key), err })

      return false
    }
  }

  async delete(key: CacheKey): Promise<boolean> {
    validateKey(key)

    try {
      await unlink(this.filePathFor(key))

      return true
    } catch (err) {
      if (!isNotFoundError(err)) {
        this.logger.warn("cache delete failed", { digest: digestKey(key), err })
      }

      return false
    }
  }

  async clear(): Promise<boolean> {
    if (this.deps.codec.extension === "") {
      await this.removeChildren(this.rootDir)
    } else {
      await this.removeOwnFiles()
    }

    await mkdir(this.rootDir, { recursive: true })

    return true
  }

  async has(key: CacheKey): Promise<boolean> {
    validateKey(key)

    const value = await this.get(key)

    return value !== null && value !== undefined
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

    for (const key of batch) {
      await this.delete(key)
    }

    return true
  }

  /** Absolute path of the file holding `key`. */
  filePathFor(key: CacheKey): string {
    return path.join(this.rootDir, `${digestKey(key)}${this.deps.codec.extension}`)
  }

  /**
   * Remove everything below `dir`, child-first, so each directory is empty by
   * the time it is removed. `dir` itself is kept.
   */
  private async removeChildren(dir: string): Promise<void> {
    const entries = await this.listDir(dir)

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name)

      if (entry.isDirectory()) {
        await this.removeChildren(entryPath)
        await this.removeEntry(entryPath, rmdir)
      } else {
        await this.removeEntry(entryPath, unlink)
      }
    }
  }

  private async removeOwnFiles(): Promise<void> {
    const entries = await this.listDir(this.rootDir)

    for (const entry of entries) {
      if (entry.isFile() && this.ownsFile(entry.name)) {
        await this.removeEntry(path.join(this.rootDir, entry.name), unlink)
      }
    }
  }

  // record files plus temp files an interrupted write left behind
  private ownsFile(fileName: string): boolean {
    const { extension } = this.deps.codec

    return fileName.endsWith(extension) || isTempFileFor(fileName, extension)
  }

  private async listDir(dir: string) {
    try {
      return await readdir(dir, { withFileTypes: true })
    } catch (err) {
      if (!isNotFoundError(err)) {
        this.logger.warn("cache clear could not list directory", { path: dir, err })
      }

      return []
    }
  }

  private async removeEntry(
    entryPath: string,
    remove: (p: string) => Promise<void>,
  ): Promise<void> {
    try {
      await remove(entryPath)
    } catch (err) {
      this.logger.warn("cache clear could not remove entry", { path: entryPath, err })
    }
  }
}
