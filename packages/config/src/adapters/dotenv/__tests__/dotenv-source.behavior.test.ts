import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses key=value pairs", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "MEMORY_FRAME_COUNT=16\nSERVER_HOST=localhost\nLOG_PRETTY=true",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })
    const result = await source.load()

    expect(result).toEqual({
      MEMORY_FRAME_COUNT: "16",
      SERVER_HOST: "localhost",
      LOG_PRETTY: "true",
    })
  })

  it("handles quoted values", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      `SINGLE='single quoted'\nDOUBLE="double quoted"\nUNQUOTED=no quotes`,
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })
    const result = await source.load()

    expect(result).toEqual({
      SINGLE: "single quoted",
      DOUBLE: "double quoted",
      UNQUOTED: "no quotes",
    })
  })

  it("ignores comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# frames\nMEMORY_FRAME_COUNT=4\n# policy\nMEMORY_DEFAULT_POLICY=lru",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })
    const result = await source.load()

    expect(result).toEqual({
      MEMORY_FRAME_COUNT: "4",
      MEMORY_DEFAULT_POLICY: "lru",
    })
  })

  it("returns empty object when file missing and not required", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })
    const result = await source.load()

    expect(result).toEqual({})
  })

  it("rejects with ENOENT when file missing and required", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("resolves path relative to cwd", async () => {
    const subdir = path.join(cwd, "config")
    await fs.mkdir(subdir)
    await fs.writeFile(path.join(subdir, ".env"), "SERVICE_NAME=Paging Simulator")

    const source = new DotenvSource({ file: ".env", required: true, cwd: subdir })
    const result = await source.load()

    expect(result).toEqual({ SERVICE_NAME: "Paging Simulator" })
  })
})
