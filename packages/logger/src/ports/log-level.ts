export const logLevelNames = ["debug", "info", "notice", "warning", "error"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels.
 *
 * These values define the ordering of log levels for comparison
 * and filtering (higher = more severe).
 */
export const LogLevels = {
  /** Information normally of use only when debugging a program. */
  Debug: 0,
  /** Informational messages about normal operation. */
  Info: 10,
  /** Conditions that are not errors but may need special handling. */
  Notice: 20,
  /** Not an error, but more severe than a notice. */
  Warning: 30,
  /** Error conditions. */
  Error: 40,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export const LEVEL_SEVERITY: Record<LogLevelName, LogLevel> = {
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  notice: LogLevels.Notice,
  warning: LogLevels.Warning,
  error: LogLevels.Error,
}

/** Four-character markers used in text output. Debug lines carry a blank one. */
export const LEVEL_MARKER: Record<LogLevelName, string> = {
  debug: "    ",
  info: "INFO",
  notice: "NOTE",
  warning: "WARN",
  error: "ERRR",
}

export function isLogLevelName(value: string): value is LogLevelName {
  return logLevelNames.some((name) => name === value)
}

export function isLevelAtLeast(level: LogLevelName, min: LogLevelName): boolean {
  return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[min]
}
