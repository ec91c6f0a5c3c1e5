import { ConfigMergeConflictError, ConfigSourceError } from "../../core/errors"
import { isPlainObject, isUnsafeKey, ownValue } from "../../core/utils/tree"
import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with this prefix are loaded; the prefix is stripped. */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /**
   * Splits keys into nested tables, e.g. with "__": `SERVE__PORT` loads as
   * `{ SERVE: { PORT } }`.
   */
  separator?: string

  /** Lowercases every key segment so variables line up with file and flag keys. */
  lowercase?: boolean
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix?: string | undefined
  private readonly separator?: string | undefined
  private readonly lowercase: boolean
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.separator = options.separator
    this.lowercase = options.lowercase ?? false
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const loaded: Record<string, unknown> = {}

    for (const [rawKey, value] of Object.entries(this.env)) {
      if (this.prefix && !rawKey.startsWith(this.prefix)) continue

      const key = this.prefix ? rawKey.slice(this.prefix.length) : rawKey
      const segments = (this.separator ? key.split(this.separator) : [key]).map((s) =>
        this.lowercase ? s.toLowerCase() : s,
      )

      if (segments.some((s) => s.length === 0)) continue

      this.assign(loaded, segments, value)
    }

    return loaded
  }

  private assign(target: Record<string, unknown>, segments: string[], value: string | undefined) {
    let level = target

    for (const [index, segment] of segments.entries()) {
      const path = segments.slice(0, index + 1).join(".")

      if (isUnsafeKey(segment)) {
        throw new ConfigSourceError(`Environment key "${path}" is not allowed`, {
          source: this.name,
          path,
        })
      }

      const existing = ownValue(level, segment)

      if (index === segments.length - 1) {
        if (isPlainObject(existing)) throw new ConfigMergeConflictError(path, this.name, this.name)
        level[segment] = value
        return
      }

      if (existing === undefined) {
        const table: Record<string, unknown> = {}
        level[segment] = table
        level = table
      } else if (isPlainObject(existing)) {
        level = existing
      } else {
        throw new ConfigMergeConflictError(path, this.name, this.name)
      }
    }
  }
}
