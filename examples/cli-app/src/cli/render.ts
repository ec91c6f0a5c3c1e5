import type { IConfig } from "@layered/config"
import type { Settings } from "../app/config"

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function lines(value: Record<string, unknown>, prefix = ""): [string, unknown][] {
  return Object.entries(value).flatMap(([key, child]): [string, unknown][] => {
    if (child === undefined) return []

    const path = prefix ? `${prefix}.${key}` : key

    return isTable(child) ? lines(child, path) : [[path, child]]
  })
}

/**
 * `json` prints the settings object; `text` prints one `path = value` line
 * per setting. From verbosity 1 each text line names its source.
 */
export function render(config: IConfig<Settings>): string {
  const { format, verbosity } = config.value

  if (format === "json") return `${JSON.stringify(config.value)}\n`

  return lines(config.value)
    .map(([path, value]) => {
      const shown = Array.isArray(value) ? value.join(",") : String(value)

      return verbosity > 0 ? `${path} = ${shown}  # ${config.explain(path)}` : `${path} = ${shown}`
    })
    .map((line) => `${line}\n`)
    .join("")
}
