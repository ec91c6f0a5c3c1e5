import type { IConfig } from "../ports/config"
import type { Provenance } from "./merge"
import { deepFreeze, leafPaths } from "./utils/tree"

export const DEFAULT_PROVENANCE = "default"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Provenance>,
    private readonly mergedPaths: ReadonlySet<string>,
    private readonly sourceOrder: readonly string[] = [],
  ) {
    deepFreeze(this.data)
  }

  get value(): T {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.data) as Array<keyof T & string>
  }

  explain(path: string): string {
    return this.provenance[path] ?? DEFAULT_PROVENANCE
  }

  sourcesUsed(): string[] {
    const used = new Set(Object.values(this.provenance))
    const ordered = this.sourceOrder.filter((name) => used.has(name))

    for (const name of used) {
      if (!ordered.includes(name)) ordered.push(name)
    }

    return [...new Set(ordered)]
  }

  unknownKeys(): string[] {
    const known = new Set(leafPaths(this.data))

    return [...this.mergedPaths].filter((p) => !known.has(p))
  }
}
