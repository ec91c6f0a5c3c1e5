export type ConfigScalar = string | number | boolean

/**
 * A leaf of a configuration tree. Numbers only ever carry integer
 * occurrence counts; everything else typed stays a string until the schema
 * coerces it.
 */
export type ConfigValue = ConfigScalar | readonly ConfigValue[]

/**
 * Ordered, nested key/value view produced by a configuration source.
 * Keys are unique per level and iterate in insertion order.
 */
export interface ConfigTree {
  readonly [key: string]: ConfigNode
}

export type ConfigNode = ConfigValue | ConfigTree
