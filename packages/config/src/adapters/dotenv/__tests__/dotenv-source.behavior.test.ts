import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigSourceError } from "../../../core/errors"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-source-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("is named after its file", () => {
    expect(new DotenvSource({ file: ".env.local", required: false, cwd }).name).toBe(
      "dotenv:.env.local",
    )
  })

  it("parses quoted values and skips comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# defaults\nFORMAT='json'\nOUTPUT=\"out dir\"\nVERBOSITY=1\n",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({ FORMAT: "json", OUTPUT: "out dir", VERBOSITY: "1" })
  })

  it("returns an empty object when an optional file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects with ConfigSourceError when a required file is missing", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toBeInstanceOf(ConfigSourceError)
  })

  it("rejects with ConfigSourceError when the path is a directory", async () => {
    await fs.mkdir(path.join(cwd, ".env"))

    const source = new DotenvSource({ file: ".env", required: false, cwd })

    await expect(source.load()).rejects.toBeInstanceOf(ConfigSourceError)
  })
})
