import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { type ConfigFileOptions, readConfigFile } from "../utils/read-config-file"

/**
 * @example { file: ".env.production", required: true, cwd: "./config" }
 */
export type DotenvSourceOptions = ConfigFileOptions

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const { content } = await readConfigFile(this.opts, this.name)

    return content === undefined ? {} : parse(content)
  }
}
