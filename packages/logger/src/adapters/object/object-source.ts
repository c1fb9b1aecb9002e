import type { LogFormat, LoggerConfigKey } from "../../core/config/logger-config-schema"
import type { LogLevelName } from "../../ports/log-level"
import type { ConfigSource } from "../../ports/config-source"

/** Settings supplied in code. `undefined` leaves a setting to other sources. */
export type LoggerOverrides = {
  label?: string | undefined
  level?: LogLevelName | undefined
  writeToFile?: boolean | undefined
  directory?: string | undefined
  maxFileCount?: number | undefined
  maxFileSize?: number | undefined
  keepHistory?: boolean | undefined
  format?: LogFormat | undefined
}

function toConfigKeys(o: LoggerOverrides): Record<LoggerConfigKey, unknown> {
  return {
    LABEL: o.label,
    LEVEL: o.level,
    WRITE_TO_FILE: o.writeToFile,
    DIRECTORY: o.directory,
    MAX_FILE_COUNT: o.maxFileCount,
    MAX_FILE_SIZE: o.maxFileSize,
    KEEP_HISTORY: o.keepHistory,
    FORMAT: o.format,
  }
}

/** Logger settings from a host application, such as command-line flags. */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly overrides: LoggerOverrides,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return Object.fromEntries(
      Object.entries(toConfigKeys(this.overrides)).filter(([, value]) => value !== undefined),
    )
  }
}
