import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ConfigurationError } from "../../errors/logger-error"
import type { ConfigSource } from "../../ports/config-source"
import { LoggerConfig } from "./logger-config"
import { isConfigKey, type LoggerConfigKey, loggerConfigSchema } from "./logger-config-schema"

export type LoadLoggerConfigOptions = {
  /** Applied in order, later sources win. Defaults to `LOGBOOK_*` variables. */
  sources?: ConfigSource[]
}

/**
 * @throws ConfigurationError (`invalid_config`) listing every invalid key.
 */
export async function loadLoggerConfig({
  sources,
}: LoadLoggerConfigOptions = {}): Promise<LoggerConfig> {
  const merged: Record<string, unknown> = {}
  const provenance: Partial<Record<LoggerConfigKey, string>> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      if (isConfigKey(key)) provenance[key] = source.name
    }
  }

  const result = loggerConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new ConfigurationError(
      "invalid_config",
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { keys: result.error.issues.map((issue) => issue.path.map(String).join(".")) },
    )
  }

  return new LoggerConfig(result.data, provenance, Object.keys(merged))
}
