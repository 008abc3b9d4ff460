import fs from "node:fs/promises"
import path from "node:path"
import { createTempDir, removeTempDir } from "../../../tests/utils/temp-dir"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await createTempDir("dotenv-test-")
  })

  afterEach(async () => {
    await removeTempDir(cwd)
  })

  it("parses key=value pairs, comments and quotes", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# cache\nCACHE_DRIVER=file\nCACHE_DIR='/var/cache/app'\n",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(source.name).toBe("dotenv:.env")
    expect(await source.load()).toStrictEqual({
      CACHE_DRIVER: "file",
      CACHE_DIR: "/var/cache/app",
    })
  })

  it("returns nothing when an optional file is missing", async () => {
    const source = new DotenvSource({ file: ".env.local", required: false, cwd })

    expect(await source.load()).toStrictEqual({})
  })

  it("rejects when a required file is missing", async () => {
    const source = new DotenvSource({ file: ".env.local", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })
})
