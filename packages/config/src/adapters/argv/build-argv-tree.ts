import { ConfigMergeConflictError } from "../../core/errors"
import { deepFreeze } from "../../core/utils/tree"
import type { FlagSpec, ParsedInvocation } from "../../ports/invocation"
import type { ConfigNode, ConfigTree, ConfigValue } from "../../ports/tree"

export type BuildArgvTreeOptions = {
  /**
   * Also record the name of the top-level subcommand under this key, e.g.
   * `{ command: "serve", serve: { port: "8080" } }`. Only the root level
   * gets it; deeper subcommands show up as nested tables.
   */
  subcommandField?: string
}

/**
 * Converts a parsed command line into a configuration tree.
 *
 * Only flags that were supplied appear in the tree, so lower-precedence
 * sources keep their values for everything else. Each matched subcommand
 * nests its own flags under its name. Tokens are kept as strings; coercion
 * is left to the schema.
 *
 * @example
 * ```ts
 * // app -f json -vv serve -p 8080 -H a -H b
 * buildArgvTree(invocation)
 * // { format: "json", verbosity: 2, serve: { port: "8080", header: ["a", "b"] } }
 * ```
 *
 * @throws ConfigMergeConflictError when a supplied flag shares its key with
 *   the matched subcommand at the same level, or with `subcommandField`.
 */
export function buildArgvTree(
  invocation: ParsedInvocation,
  options: BuildArgvTreeOptions = {},
): ConfigTree {
  const tree = collect(invocation, "")
  const field = options.subcommandField
  const matched = invocation.subcommand()

  if (field && matched) {
    if (Object.hasOwn(tree, field)) {
      const holder = matched.name === field ? `the subcommand "${field}"` : "a flag"
      throw collision(field, holder, "the subcommand field")
    }

    tree[field] = matched.name
  }

  return deepFreeze(tree)
}

function collect(invocation: ParsedInvocation, prefix: string): Record<string, ConfigNode> {
  const tree: Record<string, ConfigNode> = {}

  for (const flag of invocation.flags()) {
    if (!invocation.isPresent(flag.name)) continue

    const value = flagValue(invocation, flag)

    if (value !== undefined) tree[flag.name] = value
  }

  const matched = invocation.subcommand()

  if (matched) {
    const path = prefix ? `${prefix}.${matched.name}` : matched.name

    if (Object.hasOwn(tree, matched.name)) {
      throw collision(path, "a flag", `the subcommand "${matched.name}"`)
    }

    tree[matched.name] = collect(matched.invocation, path)
  }

  return tree
}

function collision(path: string, first: string, second: string): ConfigMergeConflictError {
  return new ConfigMergeConflictError(
    path,
    "argv",
    "argv",
    `Command-line key "${path}" is set by ${first} and by ${second}`,
  )
}

function flagValue(invocation: ParsedInvocation, flag: FlagSpec): ConfigValue | undefined {
  switch (flag.kind) {
    case "boolean":
      return !flag.negate
    case "count": {
      const occurrences = invocation.occurrencesOf(flag.name)
      return occurrences > 0 ? occurrences : undefined
    }
    case "single":
      return invocation.valueOf(flag.name)
    case "multiple": {
      const values = invocation.valuesOf(flag.name)
      return values === undefined ? undefined : [...values]
    }
  }
}
