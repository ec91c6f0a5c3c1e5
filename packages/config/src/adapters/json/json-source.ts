import type { ConfigSource } from "../../ports/source"
import { ConfigSourceError } from "../../core/errors"
import { isPlainObject } from "../../core/utils/tree"
import { type ConfigFileOptions, readConfigFile } from "../utils/read-config-file"

/**
 * @example { file: "config.json", required: false }
 */
export type JsonSourceOptions = ConfigFileOptions

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const { filePath, content } = await readConfigFile(this.opts, this.name)

    if (content === undefined) return {}

    let parsed: unknown

    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw new ConfigSourceError(`Invalid JSON in configuration file ${filePath}`, {
        source: this.name,
        file: filePath,
        cause: err,
      })
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigSourceError(`Configuration file ${filePath} must contain a JSON object`, {
        source: this.name,
        file: filePath,
      })
    }

    return parsed
  }
}
