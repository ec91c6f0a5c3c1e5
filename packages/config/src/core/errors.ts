import { BaseError } from "@layered/errors"
import { type ZodError, z } from "zod"

export type ConfigErrorCode =
  | "config_source_failed"
  | "config_merge_conflict"
  | "config_validation_failed"

export class ConfigSourceError extends BaseError<"config_source_failed"> {
  constructor(
    message: string,
    options: {
      source: string
      file?: string
      path?: string
      cause?: unknown
      isOperational?: boolean
    },
  ) {
    super(message, {
      code: "config_source_failed",
      context: {
        source: options.source,
        ...(options.file !== undefined && { file: options.file }),
        ...(options.path !== undefined && { path: options.path }),
      },
      cause: options.cause,
      isOperational: options.isOperational ?? true,
    })
  }
}

/**
 * A key path is a table in one source and a plain value in another, or two
 * command-line entries claim the same key.
 */
export class ConfigMergeConflictError extends BaseError<"config_merge_conflict"> {
  readonly path: string

  constructor(
    path: string,
    source: string,
    previousSource: string | undefined,
    message = `Configuration key "${path}" from ${source} conflicts with the shape provided by ${previousSource ?? "an earlier source"}`,
  ) {
    super(
      message,
      {
        code: "config_merge_conflict",
        context: { path, source, previousSource },
      },
    )

    this.path = path
  }
}

export class ConfigValidationError extends BaseError<"config_validation_failed"> {
  constructor(error: ZodError) {
    super(`Configuration validation failed:\n${z.prettifyError(error)}`, {
      code: "config_validation_failed",
      context: {
        issues: error.issues.map((issue) => ({
          path: issue.path.map(String).join("."),
          message: issue.message,
        })),
      },
      cause: error,
    })
  }
}
