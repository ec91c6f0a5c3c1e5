import type { ParsedInvocation } from "../../ports/invocation"
import type { ConfigSource } from "../../ports/source"
import { type BuildArgvTreeOptions, buildArgvTree } from "./build-argv-tree"

export type ArgvSourceOptions = BuildArgvTreeOptions & {
  invocation: ParsedInvocation

  /** @default "argv" */
  name?: string
}

/**
 * Command-line flags as a configuration source. Meant to be listed last so
 * that explicit flags win over files and the environment.
 */
export class ArgvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: ArgvSourceOptions) {
    this.name = opts.name ?? "argv"
  }

  async load(): Promise<Record<string, unknown>> {
    const tree = buildArgvTree(this.opts.invocation, {
      subcommandField: this.opts.subcommandField,
    })

    return structuredClone(tree)
  }
}
