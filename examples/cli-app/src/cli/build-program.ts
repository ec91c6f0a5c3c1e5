import { Command } from "commander"

export type CommandHandler = (command: Command) => Promise<void>

function increase(_: string, previous: number): number {
  return previous + 1
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/**
 * Every command hands itself to `handler`; parse errors and `--help` throw a
 * `CommanderError` instead of exiting.
 */
export function buildProgram(handler: CommandHandler): Command {
  const program = new Command("cli-app")
    .description("Print the settings resolved from cli-app.json, CLI_APP_* variables and flags")
    .exitOverride()
    .option("-f, --format <format>", "output format: json or text")
    .option("-v, --verbosity", "show where each value came from (repeatable)", increase, 0)
    .option("--no-color", "plain output")
    .action((_opts, cmd: Command) => handler(cmd))

  program
    .command("subcommand")
    .description("Run with subcommand settings")
    .option("-F, --flag", "turn the flag on")
    .option("-i, --ids <id>", "an id to include (repeatable)", collect, [])
    .action((_opts, cmd: Command) => handler(cmd))

  return program
}
