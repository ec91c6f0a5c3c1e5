import { createNullLogger, type Logger } from "@layered/logger"
import type { ZodType } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config, DEFAULT_PROVENANCE } from "./config"
import { ConfigSourceError, ConfigValidationError } from "./errors"
import { mergeTree, type Provenance } from "./merge"
import { isPlainObject, leafPaths } from "./utils/tree"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /**
   * Sources in increasing precedence. List command-line flags last.
   * @default [new EnvSource()]
   */
  sources?: ConfigSource[]

  /** @default a NullLogger */
  logger?: Logger
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
  logger = createNullLogger(),
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const log = logger.child({ module: "config" })
  const merged: Record<string, unknown> = {}
  const provenance: Provenance = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values: unknown = await source.load()

    if (!isPlainObject(values)) {
      throw new ConfigSourceError(`Configuration source ${source.name} did not load an object`, {
        source: source.name,
        isOperational: false,
      })
    }

    mergeTree(merged, values, source.name, provenance)

    log.debug("Configuration source loaded", {
      source: source.name,
      keys: leafPaths(values).length,
    })
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  for (const path of leafPaths(result.data)) {
    if (!(path in provenance)) {
      provenance[path] = DEFAULT_PROVENANCE
    }
  }

  const config = new Config<T>(
    result.data,
    provenance,
    new Set(leafPaths(merged)),
    resolvedSources.map((s) => s.name),
  )

  log.debug("Configuration validated", { sources: config.sourcesUsed() })

  return config
}
