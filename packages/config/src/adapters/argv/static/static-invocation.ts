import type {
  FlagKind,
  FlagSpec,
  MatchedSubcommand,
  ParsedInvocation,
} from "../../../ports/invocation"

export type StaticFlagValue = boolean | number | string | readonly string[]

export type StaticInvocationInit = {
  /**
   * Flags defined at this level. Flags with a value but no declaration are
   * inferred from the value: boolean, count (number), single (string) or
   * multiple (array).
   */
  flags?: readonly FlagSpec[]

  /** Supplied flags. A flag without an entry, or set to `false`, is absent. */
  values?: Readonly<Record<string, StaticFlagValue | undefined>>

  subcommand?: MatchedSubcommand
}

/**
 * An invocation described as plain data, for parsers without an adapter of
 * their own (e.g. `util.parseArgs`).
 */
export class StaticInvocation implements ParsedInvocation {
  private readonly declared: readonly FlagSpec[]
  private readonly values: Readonly<Record<string, StaticFlagValue | undefined>>
  private readonly matched?: MatchedSubcommand | undefined

  constructor(init: StaticInvocationInit = {}) {
    this.declared = init.flags ?? []
    this.values = init.values ?? {}
    this.matched = init.subcommand
  }

  flags(): readonly FlagSpec[] {
    const names = new Set(this.declared.map((f) => f.name))
    const inferred: FlagSpec[] = []

    for (const [name, value] of Object.entries(this.values)) {
      if (value !== undefined && !names.has(name)) {
        inferred.push({ name, kind: inferKind(value) })
      }
    }

    return [...this.declared, ...inferred]
  }

  isPresent(name: string): boolean {
    const value = this.values[name]
    return value !== undefined && value !== false
  }

  valueOf(name: string): string | undefined {
    const value = this.values[name]
    return typeof value === "string" ? value : undefined
  }

  valuesOf(name: string): readonly string[] | undefined {
    const value = this.values[name]

    if (typeof value === "string") return [value]
    return isStringArray(value) ? value : undefined
  }

  occurrencesOf(name: string): number {
    const value = this.values[name]

    if (typeof value === "number") return value
    return value === true ? 1 : 0
  }

  subcommand(): MatchedSubcommand | undefined {
    return this.matched
  }
}

function isStringArray(value: unknown): value is readonly string[] {
  return Array.isArray(value)
}

function inferKind(value: StaticFlagValue): FlagKind {
  if (typeof value === "boolean") return "boolean"
  if (typeof value === "number") return "count"
  if (typeof value === "string") return "single"
  return "multiple"
}
