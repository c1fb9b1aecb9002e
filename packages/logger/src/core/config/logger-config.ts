import type { LoggerOptions } from "../../ports/logger-options"
import { isConfigKey, type LoggerConfigKey, type LoggerConfigValues } from "./logger-config-schema"

/** Where a value came from when no source supplied it. */
export const DEFAULT_PROVENANCE = "default"

/**
 * Validated logger settings together with the source of each value.
 *
 * @example
 * ```typescript
 * const config = await loadLoggerConfig({
 *   sources: [new ObjectSource({ label: "billing" }), new EnvSource({ label: "billing" })],
 * })
 *
 * config.explain("LABEL")     // "object:overrides"
 * config.explain("LEVEL")     // "default"
 * const logger = createLogger(config.toLoggerOptions())
 * ```
 */
export class LoggerConfig {
  readonly value: Readonly<LoggerConfigValues>

  constructor(
    values: LoggerConfigValues,
    private readonly provenance: Readonly<Partial<Record<LoggerConfigKey, string>>>,
    private readonly suppliedKeys: readonly string[],
  ) {
    this.value = Object.freeze({ ...values })
  }

  /** Name of the source that supplied `key`, or `"default"`. */
  explain(key: LoggerConfigKey): string {
    return this.provenance[key] ?? DEFAULT_PROVENANCE
  }

  sourcesUsed(): string[] {
    const keys = Object.keys(this.value).filter(isConfigKey)
    return [...new Set(keys.map((key) => this.explain(key)))]
  }

  /** Supplied keys the logger doesn't read. Usually typos. */
  unknownKeys(): string[] {
    return this.suppliedKeys.filter((key) => !isConfigKey(key))
  }

  toLoggerOptions(): LoggerOptions {
    const v = this.value

    return {
      label: v.LABEL,
      level: v.LEVEL,
      keepHistory: v.KEEP_HISTORY,
      writeToFile: v.WRITE_TO_FILE,
      maxFileCount: v.MAX_FILE_COUNT,
      ...(v.DIRECTORY !== undefined && { directory: v.DIRECTORY }),
      ...(v.MAX_FILE_SIZE !== undefined && { maxFileSize: v.MAX_FILE_SIZE }),
    }
  }
}
