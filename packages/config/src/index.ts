export * from "./ports/config"
export * from "./ports/invocation"
export * from "./ports/source"
export * from "./ports/tree"

export * from "./core/config"
export * from "./core/errors"
export * from "./core/load"

export * from "./adapters/argv/argv-source"
export * from "./adapters/argv/build-argv-tree"
export * from "./adapters/argv/commander/commander-invocation"
export * from "./adapters/argv/static/static-invocation"
export * from "./adapters/dotenv/dotenv-source"
export * from "./adapters/env/env-source"
export * from "./adapters/json/json-source"
export * from "./adapters/object/object-source"
