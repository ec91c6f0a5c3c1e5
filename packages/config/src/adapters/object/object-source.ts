import type { ConfigSource } from "../../ports/source"

export class ObjectSource implements ConfigSource {
  constructor(
    private readonly obj: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return structuredClone(this.obj)
  }
}
