import type { Command, Option } from "commander"

import type {
  FlagSpec,
  MatchedSubcommand,
  ParsedInvocation,
} from "../../../ports/invocation"

export type CommanderInvocationOptions = {
  /**
   * Treat options that only hold their declared default as supplied.
   * @default false
   */
  includeDefaults?: boolean
}

const SUPPLIED_SOURCES = new Set(["cli", "env", "implied"])

/**
 * Reads a commander program after `parse()` / `parseAsync()`.
 *
 * Flag names are commander attribute names (`--dry-run` is `dryRun`), and a
 * `--color` / `--no-color` pair is one flag. Options whose value comes from
 * `.default()` are absent unless `includeDefaults` is set, so declared
 * defaults never shadow lower-precedence sources.
 *
 * @example
 * ```ts
 * program.command("serve").option("-p, --port <port>").action((_opts, cmd: Command) => {
 *   const source = new ArgvSource({ invocation: CommanderInvocation.fromCommand(cmd) })
 * })
 * ```
 */
export class CommanderInvocation implements ParsedInvocation {
  constructor(
    private readonly command: Command,
    private readonly matchedBelow: readonly Command[] = [],
    private readonly options: CommanderInvocationOptions = {},
  ) {}

  /**
   * Builds the invocation for a whole chain from the command that ran, which
   * is the one commander hands to action handlers and hooks.
   */
  static fromCommand(
    command: Command,
    options: CommanderInvocationOptions = {},
  ): CommanderInvocation {
    const chain: Command[] = []

    for (let current: Command | null = command; current; current = current.parent) {
      chain.unshift(current)
    }

    const [root = command, ...below] = chain

    return new CommanderInvocation(root, below, options)
  }

  flags(): readonly FlagSpec[] {
    const byName = new Map<string, Option[]>()

    for (const option of this.command.options) {
      const name = option.attributeName()
      byName.set(name, [...(byName.get(name) ?? []), option])
    }

    return [...byName].map(([name, options]) => this.classify(name, options))
  }

  isPresent(name: string): boolean {
    if (this.read(name) === undefined) return false

    const source = this.command.getOptionValueSource(name)

    if (source === "default") return this.options.includeDefaults === true
    return source !== undefined && SUPPLIED_SOURCES.has(source)
  }

  valueOf(name: string): string | undefined {
    const value = this.read(name)

    if (value === undefined || typeof value === "boolean" || Array.isArray(value)) {
      return undefined
    }
    return typeof value === "string" ? value : String(value)
  }

  valuesOf(name: string): readonly string[] | undefined {
    const value = this.read(name)

    if (Array.isArray(value)) return value.map((v: unknown) => String(v))
    return typeof value === "string" ? [value] : undefined
  }

  occurrencesOf(name: string): number {
    const value = this.read(name)

    if (typeof value === "number") return value
    return value === true ? 1 : 0
  }

  subcommand(): MatchedSubcommand | undefined {
    const [next, ...below] = this.matchedBelow

    if (next === undefined) return undefined

    return {
      name: next.name(),
      invocation: new CommanderInvocation(next, below, this.options),
    }
  }

  private read(name: string): unknown {
    return this.command.getOptionValue(name)
  }

  private classify(name: string, options: readonly Option[]): FlagSpec {
    const value = this.read(name)
    const takesValue = options.some((o) => o.required || o.optional)

    if (takesValue) {
      if (options.some((o) => o.variadic) || Array.isArray(value)) {
        return { name, kind: "multiple" }
      }
      // `--opt [value]` given without a value
      if (value === true) return { name, kind: "boolean" }

      return { name, kind: "single" }
    }

    if (typeof value === "number") return { name, kind: "count" }

    return { name, kind: "boolean", negate: value === false }
  }
}
