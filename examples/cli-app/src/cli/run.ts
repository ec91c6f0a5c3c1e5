import { type AppError, serializeError, toAppError } from "@layered/errors"
import { createPinoLogger, type Logger, logLevelNames } from "@layered/logger"
import { type Command, CommanderError } from "commander"
import { z } from "zod"
import { ENV_PREFIX, loadAppConfig } from "../app/config"
import { buildProgram } from "./build-program"
import { render } from "./render"

export type RunOptions = {
  env?: NodeJS.ProcessEnv
  cwd?: string
  stdout?: NodeJS.WritableStream

  /**
   * Where the default logger writes.
   * @default process.stderr
   */
  logDestination?: NodeJS.WritableStream

  /**
   * @default JSON lines at `CLI_APP_LOG_LEVEL` (info), pretty-printed when
   * `CLI_APP_LOG_PRETTY` is true
   */
  logger?: Logger
}

// Settings are not loaded yet when the logger is built.
const logLevelSchema = z.enum(logLevelNames).catch("info")
const logPrettySchema = z.stringbool().catch(false)

function defaultLogger(env: NodeJS.ProcessEnv, destination: NodeJS.WritableStream): Logger {
  return createPinoLogger(
    { destination },
    {
      level: logLevelSchema.parse(env[`${ENV_PREFIX}LOG_LEVEL`]),
      prettify: logPrettySchema.parse(env[`${ENV_PREFIX}LOG_PRETTY`]),
    },
    { service: "cli-app" },
  )
}

function commandPath(command: Command): string {
  const names: string[] = []

  for (let current: Command | null = command; current; current = current.parent) {
    names.unshift(current.name())
  }

  return names.join(" ")
}

/**
 * Operational failures are reported without a stack; anything else is a
 * bug and is logged in full.
 */
function reportFailure(logger: Logger, error: AppError): void {
  if (error.isOperational) {
    logger.error("Could not resolve settings", { code: error.code, error: serializeError(error) })
    return
  }

  logger.fatal("Unexpected failure", { code: error.code, err: error })
}

/**
 * Runs the command line `args` (without the node and script paths) and
 * resolves to the process exit code.
 */
export async function run(args: string[], options: RunOptions = {}): Promise<number> {
  const env = options.env ?? process.env
  const logger = options.logger ?? defaultLogger(env, options.logDestination ?? process.stderr)
  const stdout = options.stdout ?? process.stdout

  const program = buildProgram(async (command) => {
    const config = await loadAppConfig({
      command,
      env,
      cwd: options.cwd ?? process.cwd(),
      logger: logger.child({ command: commandPath(command) }),
    })

    stdout.write(render(config))
  })

  try {
    await program.parseAsync(args, { from: "user" })
    return 0
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode

    reportFailure(logger, toAppError(err))
    return 1
  }
}
