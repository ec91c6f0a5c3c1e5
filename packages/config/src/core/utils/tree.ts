export function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false

  const proto: unknown = Object.getPrototypeOf(v)

  return proto === Object.prototype || proto === null
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }

  return value
}

/**
 * Dotted paths of every leaf below `value`. Arrays are leaves; empty
 * objects contribute nothing.
 */
export function leafPaths(value: unknown, prefix = ""): string[] {
  if (!isPlainObject(value)) return prefix ? [prefix] : []

  return Object.entries(value).flatMap(([key, child]) =>
    child === undefined ? [] : leafPaths(child, prefix ? `${prefix}.${key}` : key),
  )
}

const UNSAFE_KEYS = new Set(["__proto__", "constructor", "prototype"])

/** Keys that would reach an object's prototype when assigned or read. */
export function isUnsafeKey(key: string): boolean {
  return UNSAFE_KEYS.has(key)
}

/** Own property only; inherited members such as `constructor` read as absent. */
export function ownValue(target: Record<string, unknown>, key: string): unknown {
  return Object.hasOwn(target, key) ? target[key] : undefined
}
