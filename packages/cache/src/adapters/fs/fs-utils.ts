import { createHash, randomUUID } from "node:crypto"
import { type FileHandle, open, readFile, rename, rm } from "node:fs/promises"
import type { CacheKey } from "../../ports/cache-key"

/**
 * Fixed-length (32 hex chars) locator for a key. Collisions are accepted.
 */
export function digestKey(key: CacheKey): string {
  return createHash("md5").update(key, "utf8").digest("hex")
}

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Read a whole file, or `null` when it does not exist.
 */
export async function readFileIfExists(filePath: string): Promise<Uint8Array | null> {
  try {
    return await readFile(filePath)
  } catch (err) {
    if (isNotFoundError(err)) return null
    throw err
  }
}

const TEMP_SUFFIX = ".tmp"

/**
 * Whether `fileName` is a temp file {@link writeFileExclusive} left behind
 * for a target ending in `extension`.
 */
export function isTempFileFor(fileName: string, extension: string): boolean {
  return fileName.endsWith(TEMP_SUFFIX) && fileName.includes(`${extension}.`)
}

/**
 * Replace `filePath` with `bytes` in one step.
 *
 * The payload goes into a sibling temp file created with the exclusive
 * create flag, is written with a single call, and is renamed over the
 * target only when every byte was written. Readers see the old file or the
 * new one, never a partial write.
 *
 * @returns `false` when the write came up short.
 */
export async function writeFileExclusive(
  filePath: string,
  bytes: Uint8Array,
): Promise<boolean> {
  const tempPath = `${filePath}.${randomUUID()}${TEMP_SUFFIX}`
  const handle = await open(tempPath, "wx")

  try {
    const bytesWritten = await writeAndClose(handle, bytes)

    if (bytesWritten !== bytes.byteLength) return false

    await rename(tempPath, filePath)

    return true
  } finally {
    // no-op after a successful rename
    await rm(tempPath, { force: true })
  }
}

async function writeAndClose(handle: FileHandle, bytes: Uint8Array): Promise<number> {
  try {
    const { bytesWritten } = await handle.write(bytes, 0, bytes.byteLength, 0)

    return bytesWritten
  } finally {
    await handle.close()
  }
}
