import type { LogLevelName } from "./log-level"
import type { LogValue } from "./log-value"

export type SourceLocation = {
  file: string
  line: number
  column: number
  fn?: string
}

/**
 * A single log call, built by the logger and handed to a formatter.
 * Records are not kept once formatted.
 */
export type LogRecord = Readonly<{
  label: string
  /** Value of the logger's message counter when the call was accepted. */
  sequence: number
  level: LogLevelName
  values: readonly LogValue[]
  err?: unknown
  source?: SourceLocation
  timestamp: Date
}>

export type LogMeta = {
  err?: unknown
  source?: SourceLocation
}
