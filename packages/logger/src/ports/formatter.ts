import type { LogRecord } from "./log-record"

export interface Formatter {
  /** Render a record into a single line, without a trailing newline. */
  format(record: LogRecord): string
}
