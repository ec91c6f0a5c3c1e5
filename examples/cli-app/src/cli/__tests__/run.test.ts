import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { Writable } from "node:stream"
import { PinoLogger } from "@layered/logger"
import { CONFIG_FILE } from "../../app/config"
import { run } from "../run"

function sink() {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk, _, cb) {
      chunks.push(chunk.toString())
      cb()
    },
  })

  return { stream, text: () => chunks.join(""), lines: () => chunks.map((c) => JSON.parse(c)) }
}

describe("run", () => {
  let cwd: string
  let stdout: ReturnType<typeof sink>
  let logs: ReturnType<typeof sink>
  let logger: PinoLogger

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "cli-app-run-"))
    stdout = sink()
    logs = sink()
    logger = new PinoLogger({ destination: logs.stream }, { level: "info" })
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("prints the resolved settings as JSON", async () => {
    const code = await run(["-f", "json", "subcommand", "-i", "7"], {
      env: {},
      cwd,
      stdout: stdout.stream,
      logger,
    })

    expect(code).toBe(0)
    expect(stdout.text()).toBe(
      '{"format":"json","verbosity":0,"color":true,"subcommand":{"flag":false,"ids":[7]}}\n',
    )
    expect(logs.text()).toBe("")
  })

  it("names the source of each setting from verbosity 1", async () => {
    const code = await run(["-v"], {
      env: { CLI_APP_FORMAT: "text" },
      cwd,
      stdout: stdout.stream,
      logger,
    })

    expect(code).toBe(0)
    expect(stdout.text()).toBe(
      "format = text  # env\nverbosity = 1  # argv\ncolor = true  # default\n",
    )
  })

  it("exits 1 and logs the issues when a setting is invalid", async () => {
    const code = await run(["-f", "yaml"], { env: {}, cwd, stdout: stdout.stream, logger })

    expect(code).toBe(1)
    expect(stdout.text()).toBe("")
    expect(logs.lines()).toMatchObject([
      {
        level: 50,
        msg: "Could not resolve settings",
        code: "config_validation_failed",
        error: { context: { issues: [{ path: "format" }] } },
      },
    ])
  })

  it("exits 1 when the environment and the command line disagree on shape", async () => {
    const code = await run(["subcommand", "-F"], {
      env: { CLI_APP_SUBCOMMAND: "on" },
      cwd,
      stdout: stdout.stream,
      logger,
    })

    expect(code).toBe(1)
    expect(logs.lines()).toMatchObject([
      {
        code: "config_merge_conflict",
        error: { context: { path: "subcommand", source: "argv", previousSource: "env" } },
      },
    ])
  })

  it("exits 1 on an unreadable config file", async () => {
    await fs.writeFile(path.join(cwd, CONFIG_FILE), "not json")

    const code = await run([], { env: {}, cwd, stdout: stdout.stream, logger })

    expect(code).toBe(1)
    expect(logs.lines()).toMatchObject([
      { code: "config_source_failed", error: { context: { source: `json:${CONFIG_FILE}` } } },
    ])
  })

  it("rejects a config file that tries to reach Object.prototype", async () => {
    await fs.writeFile(path.join(cwd, CONFIG_FILE), '{"__proto__":{"polluted":"yes"}}')

    const code = await run([], { env: {}, cwd, stdout: stdout.stream, logger })

    expect(code).toBe(1)
    expect(logs.lines()).toMatchObject([
      {
        code: "config_source_failed",
        error: { context: { source: `json:${CONFIG_FILE}`, path: "__proto__" } },
      },
    ])
    expect(Reflect.get({}, "polluted")).toBeUndefined()
  })

  it("logs JSON lines through the default logger", async () => {
    const code = await run(["-f", "yaml"], {
      env: {},
      cwd,
      stdout: stdout.stream,
      logDestination: logs.stream,
    })

    expect(code).toBe(1)
    expect(logs.lines()).toMatchObject([
      { level: 50, service: "cli-app", msg: "Could not resolve settings" },
    ])
  })

  it("pretty-prints logs when CLI_APP_LOG_PRETTY is true", async () => {
    const code = await run(["-f", "yaml"], {
      env: { CLI_APP_LOG_PRETTY: "true" },
      cwd,
      stdout: stdout.stream,
      logDestination: logs.stream,
    })

    expect(code).toBe(1)

    const [heading, service] = logs.text().split("\n")

    expect(heading).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] ERROR: Could not resolve settings$/)
    expect(service?.trim()).toBe('service: "cli-app"')
  })

  it("keeps JSON logs when CLI_APP_LOG_PRETTY is not a boolean", async () => {
    await run(["-f", "yaml"], {
      env: { CLI_APP_LOG_PRETTY: "sometimes" },
      cwd,
      stdout: stdout.stream,
      logDestination: logs.stream,
    })

    expect(logs.lines()).toMatchObject([{ msg: "Could not resolve settings" }])
  })
})
