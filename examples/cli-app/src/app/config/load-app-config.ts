import {
  ArgvSource,
  CommanderInvocation,
  type ConfigSource,
  EnvSource,
  type IConfig,
  JsonSource,
  loadConfig,
} from "@layered/config"
import type { Logger } from "@layered/logger"
import type { Command } from "commander"
import { type Settings, settingsSchema } from "./schema"

export const CONFIG_FILE = "cli-app.json"
export const ENV_PREFIX = "CLI_APP_"

export type LoadAppConfigOptions = {
  /** The command commander ran */
  command: Command
  env?: NodeJS.ProcessEnv
  cwd?: string
  logger?: Logger
}

/**
 * Resolves settings from, in increasing precedence, `cli-app.json`,
 * `CLI_APP_*` variables (`CLI_APP_SUBCOMMAND__FLAG` for nested keys) and
 * the command line.
 */
export async function loadAppConfig({
  command,
  env = process.env,
  cwd = process.cwd(),
  logger,
}: LoadAppConfigOptions): Promise<IConfig<Settings>> {
  const sources: ConfigSource[] = [
    new JsonSource({ file: CONFIG_FILE, required: false, cwd }),
    new EnvSource({ env, prefix: ENV_PREFIX, separator: "__", lowercase: true }),
    new ArgvSource({ invocation: CommanderInvocation.fromCommand(command) }),
  ]

  return loadConfig({
    schema: settingsSchema,
    sources,
    ...(logger && { logger }),
  })
}
