import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a logger instance.
 *
 * @remarks
 * These options define *policy*. The sink and formatter in use are
 * dependencies and are swapped through the logger's setters.
 */
export type LoggerOptions = {
  /**
   * Identifies the creator of the logger: an application, a subsystem or a
   * type. Also names the log files when writing to disk.
   * Must not be blank.
   */
  label: string

  /**
   * Minimum log level to emit. Calls below this level are ignored.
   *
   * @defaultValue "debug"
   */
  level?: LogLevelName

  /** Keep every emitted line in memory. Off by default. */
  keepHistory?: boolean

  /** Start with a rotating file sink instead of standard output. */
  writeToFile?: boolean

  /** Directory for log files. Defaults to the platform's user log directory. */
  directory?: string

  /**
   * How many rotated files to keep besides the active one.
   *
   * @defaultValue 10
   */
  maxFileCount?: number

  /** Rotate before a write once the active file holds this many bytes. */
  maxFileSize?: number

  /** Read the caller's file, line and column from a stack trace on every accepted call. */
  captureSource?: boolean
}
