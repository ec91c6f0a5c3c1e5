import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigSourceError } from "../../../core/errors"
import { JsonSource } from "../json-source"

describe("JsonSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "json-source-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("keeps nested tables and JSON types", async () => {
    await fs.writeFile(
      path.join(cwd, "app.json"),
      JSON.stringify({ verbosity: 1, color: false, serve: { host: "0.0.0.0", ids: [1, 2] } }),
    )

    const source = new JsonSource({ file: "app.json", required: true, cwd })

    expect(source.name).toBe("json:app.json")
    expect(await source.load()).toEqual({
      verbosity: 1,
      color: false,
      serve: { host: "0.0.0.0", ids: [1, 2] },
    })
  })

  it("returns an empty object when an optional file is missing", async () => {
    const source = new JsonSource({ file: "missing.json", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects with ConfigSourceError when a required file is missing", async () => {
    const source = new JsonSource({ file: "missing.json", required: true, cwd })

    const error = await source.load().catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ConfigSourceError)
    expect(error).toMatchObject({
      code: "config_source_failed",
      context: { source: "json:missing.json", file: path.join(cwd, "missing.json") },
    })
  })

  it("rejects invalid JSON and chains the parse error", async () => {
    await fs.writeFile(path.join(cwd, "app.json"), "{ format: text }")

    const source = new JsonSource({ file: "app.json", required: true, cwd })
    const error = await source.load().catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ConfigSourceError)
    expect(error).toMatchObject({ cause: expect.any(SyntaxError) })
  })

  it("rejects a root that is not an object", async () => {
    await fs.writeFile(path.join(cwd, "app.json"), JSON.stringify(["json"]))

    const source = new JsonSource({ file: "app.json", required: true, cwd })

    await expect(source.load()).rejects.toThrow(
      `Configuration file ${path.join(cwd, "app.json")} must contain a JSON object`,
    )
  })

  it("resolves an absolute path regardless of cwd", async () => {
    const file = path.join(cwd, "absolute.json")
    await fs.writeFile(file, JSON.stringify({ format: "json" }))

    const source = new JsonSource({ file, required: true, cwd: os.tmpdir() })

    expect(await source.load()).toEqual({ format: "json" })
  })
})
