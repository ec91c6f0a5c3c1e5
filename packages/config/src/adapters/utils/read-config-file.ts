import fs from "node:fs/promises"
import path from "node:path"
import { ConfigSourceError } from "../../core/errors"

export type ConfigFileOptions = {
  /**
   * Path to the file.
   *
   * Can be absolute or relative to `cwd`.
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Rejects if file not found.
   * - `false`: The source loads an empty config if file not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Reads a configuration file, resolving to `undefined` when an optional file
 * does not exist.
 */
export async function readConfigFile(
  opts: ConfigFileOptions,
  source: string,
): Promise<{ filePath: string; content: string | undefined }> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return { filePath, content: await fs.readFile(filePath, "utf-8") }
  } catch (err) {
    if (!opts.required && isMissingFile(err)) {
      return { filePath, content: undefined }
    }

    throw new ConfigSourceError(`Failed to read configuration file ${filePath}`, {
      source,
      file: filePath,
      cause: err,
    })
  }
}
