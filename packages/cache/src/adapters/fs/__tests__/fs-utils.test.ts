import fs from "node:fs/promises"
import path from "node:path"
import { createTempDir, removeTempDir } from "../../../tests/utils/temp-dir"
import { digestKey, isNotFoundError, readFileIfExists, writeFileExclusive } from "../fs-utils"

describe("fs-utils", () => {
  let dir: string

  beforeEach(async () => {
    dir = await createTempDir()
  })

  afterEach(async () => {
    await removeTempDir(dir)
  })

  it("digestKey is the md5 hex digest of the key", () => {
    expect(digestKey("abc")).toBe("900150983cd24fb0d6963f7d28e17f72")
    expect(digestKey("")).toBe("d41d8cd98f00b204e9800998ecf8427e")
  })

  it("readFileIfExists returns null for a missing file", async () => {
    expect(await readFileIfExists(path.join(dir, "missing"))).toBeNull()
  })

  it("readFileIfExists rethrows other errors", async () => {
    await expect(readFileIfExists(dir)).rejects.toMatchObject({ code: "EISDIR" })
  })

  it("writeFileExclusive replaces the target and cleans up", async () => {
    const target = path.join(dir, "entry")
    await fs.writeFile(target, "old")

    expect(await writeFileExclusive(target, new TextEncoder().encode("new"))).toBe(true)

    expect(await fs.readFile(target, "utf-8")).toBe("new")
    expect(await fs.readdir(dir)).toStrictEqual(["entry"])
  })

  it("writeFileExclusive rejects when the directory is gone", async () => {
    const target = path.join(dir, "gone", "entry")

    await expect(writeFileExclusive(target, new Uint8Array([1]))).rejects.toSatisfy(
      isNotFoundError,
    )
  })

  it("isNotFoundError only matches ENOENT errors", () => {
    expect(isNotFoundError(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe(true)
    expect(isNotFoundError(Object.assign(new Error("x"), { code: "EACCES" }))).toBe(false)
    expect(isNotFoundError({ code: "ENOENT" })).toBe(false)
  })
})
