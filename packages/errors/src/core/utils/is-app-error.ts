import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for AppError, including instances created by another copy of
 * this package.
 *
 * @example
 * ```ts
 * try {
 *   await loadConfig({ schema, sources })
 * } catch (err) {
 *   if (isAppError(err) && err.code === "config_validation_failed") {
 *     logger.error(err.message, { err })
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  return (
    e instanceof Error &&
    "code" in e &&
    typeof e.code === "string" &&
    "context" in e &&
    isRecord(e.context) &&
    "isRetryable" in e &&
    typeof e.isRetryable === "boolean" &&
    "isOperational" in e &&
    typeof e.isOperational === "boolean" &&
    "timestamp" in e &&
    isValidDate(e.timestamp)
  )
}
