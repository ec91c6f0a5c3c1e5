import { ConfigMergeConflictError, ConfigSourceError } from "./errors"
import { isPlainObject, isUnsafeKey, ownValue } from "./utils/tree"

export type Provenance = Record<string, string>

/**
 * Overlays `incoming` onto `target` in place.
 *
 * Plain objects merge key by key; any other value replaces what was there.
 * `undefined` never overrides. Every leaf written records `source` in
 * `provenance` under its dotted path.
 *
 * @throws ConfigMergeConflictError when a path is a table on one side and a
 *   value on the other.
 * @throws ConfigSourceError for `__proto__`, `constructor` and `prototype` keys.
 */
export function mergeTree(
  target: Record<string, unknown>,
  incoming: Record<string, unknown>,
  source: string,
  provenance: Provenance,
  prefix = "",
): void {
  for (const [key, value] of Object.entries(incoming)) {
    if (value === undefined) continue

    const path = prefix ? `${prefix}.${key}` : key

    if (isUnsafeKey(key)) {
      throw new ConfigSourceError(`Configuration key "${path}" from ${source} is not allowed`, {
        source,
        path,
      })
    }

    const previous = ownValue(target, key)

    if (isPlainObject(value)) {
      if (previous === undefined) {
        const table: Record<string, unknown> = {}
        target[key] = table
        mergeTree(table, value, source, provenance, path)
        continue
      }

      if (!isPlainObject(previous)) {
        throw new ConfigMergeConflictError(path, source, provenance[path])
      }

      mergeTree(previous, value, source, provenance, path)
      continue
    }

    if (isPlainObject(previous)) {
      throw new ConfigMergeConflictError(path, source, firstSourceUnder(provenance, path))
    }

    target[key] = Array.isArray(value) ? [...value] : value
    provenance[path] = source
  }
}

function firstSourceUnder(provenance: Provenance, path: string): string | undefined {
  const prefix = `${path}.`
  const match = Object.keys(provenance).find((p) => p.startsWith(prefix))

  return match === undefined ? undefined : provenance[match]
}
