import type { LogLevelName } from "./log-level"
import type { LogMeta } from "./log-record"
import type { LogValue } from "./log-value"

export interface Logger {
  debug(...values: LogValue[]): void
  info(...values: LogValue[]): void
  notice(...values: LogValue[]): void
  warning(...values: LogValue[]): void
  error(...values: LogValue[]): void

  /**
   * Log `values` at `level`, optionally attaching an error and the caller's
   * source location.
   *
   * Calls below the configured level return before anything is formatted.
   */
  log(level: LogLevelName, values: readonly LogValue[], meta?: LogMeta): void

  isLevelEnabled(level: LogLevelName): boolean
}
