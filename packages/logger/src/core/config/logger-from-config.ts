import { JsonFormatter } from "../../adapters/json/json-formatter"
import { TextFormatter } from "../../adapters/text/text-formatter"
import { createLogger, type LoggerDeps, type SinkLogger } from "../logger"
import type { LoggerConfig } from "./logger-config"

/**
 * Build a logger from loaded configuration. A formatter in `deps` takes
 * precedence over `FORMAT`.
 */
export function createLoggerFromConfig(config: LoggerConfig, deps: LoggerDeps = {}): SinkLogger {
  const formatter =
    deps.formatter ?? (config.value.FORMAT === "json" ? new JsonFormatter() : new TextFormatter())

  return createLogger(config.toLoggerOptions(), { ...deps, formatter })
}
