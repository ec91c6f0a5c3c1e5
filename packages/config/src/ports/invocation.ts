/**
 * How a flag contributes to the configuration tree.
 *
 * - `boolean`: presence flag, contributes `true` (`false` when negating)
 * - `count`: repeatable presence flag (`-vvv`), contributes its occurrence count
 * - `single`: takes one value, contributes the raw token
 * - `multiple`: repeatable or variadic, contributes every token in order
 */
export type FlagKind = "boolean" | "count" | "single" | "multiple"

export type FlagSpec = Readonly<{
  name: string
  kind: FlagKind

  /** A negating presence flag such as `--no-color` */
  negate?: boolean
}>

export type MatchedSubcommand = Readonly<{
  name: string
  invocation: ParsedInvocation
}>

/**
 * A command line that an argument parser has already accepted.
 *
 * One level of the command chain: the flags defined on the command that
 * matched, and the subcommand matched below it, if any. Parse failures are
 * reported by the parser before an invocation exists.
 */
export interface ParsedInvocation {
  /** Flags defined at this level, in definition order. */
  flags(): readonly FlagSpec[]

  /** Whether the flag was supplied (directly or resolved by the parser). */
  isPresent(name: string): boolean

  valueOf(name: string): string | undefined

  /** Tokens in the order they appeared on the command line. */
  valuesOf(name: string): readonly string[] | undefined

  occurrencesOf(name: string): number

  subcommand(): MatchedSubcommand | undefined
}
