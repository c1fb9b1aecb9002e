import {
  createRotatingFileSink,
  type RotatingFileSinkDeps,
  type RotatingFileSinkOptions,
} from "../adapters/file/rotating-file-sink"
import { StderrSideChannel } from "../adapters/stderr/stderr-side-channel"
import { StreamSink } from "../adapters/stream/stream-sink"
import { TextFormatter } from "../adapters/text/text-formatter"
import type { Formatter } from "../ports/formatter"
import { isLevelAtLeast, type LogLevelName } from "../ports/log-level"
import type { LogMeta, LogRecord } from "../ports/log-record"
import type { LogValue } from "../ports/log-value"
import type { Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"
import type { SideChannel } from "../ports/side-channel"
import { isRotatableSink, type Sink } from "../ports/sink"
import type { TimeSource } from "../ports/time-source"
import { validateLabel } from "./label"
import {
  defaultLogDirectory,
  ensureLogDirectory,
  type LogDirectoryEnvironment,
} from "./log-directory"
import { captureCallerLocation } from "./source-location"

export type FileSinkFactory = (opts: RotatingFileSinkOptions, deps: RotatingFileSinkDeps) => Sink

export type LoggerDeps = {
  /** Initial sink. Standard output when omitted, unless `writeToFile` is set. */
  sink?: Sink
  formatter?: Formatter
  sideChannel?: SideChannel
  clock?: TimeSource
  fileSinkFactory?: FileSinkFactory
  /** Used to resolve the default log directory. */
  environment?: Partial<LogDirectoryEnvironment>
}

const DEFAULT_MAX_FILE_COUNT = 10

const systemClock: TimeSource = { now: () => new Date() }

/**
 * Formats each accepted call with its {@link Formatter} and hands the line
 * to a single {@link Sink}.
 *
 * @remarks
 * Sinks are never changed in place. Switching output (file on/off, a
 * custom sink) replaces the sink as a whole.
 */
export class SinkLogger implements Logger {
  private currentLabel: string
  private threshold: LogLevelName
  private sink: Sink
  private formatter: Formatter
  private counter = 0
  private writingToFile = false

  private readonly lines: string[] | undefined
  private readonly directory: string | undefined
  private readonly maxFileCount: number
  private readonly maxFileSize: number | undefined
  private readonly captureSource: boolean

  private readonly sideChannel: SideChannel
  private readonly clock: TimeSource
  private readonly fileSinkFactory: FileSinkFactory
  private readonly environment: Partial<LogDirectoryEnvironment>

  /**
   * @throws ConfigurationError when the label is blank.
   */
  constructor(opts: LoggerOptions, deps: LoggerDeps = {}) {
    this.currentLabel = validateLabel(opts.label)
    this.threshold = opts.level ?? "debug"
    this.lines = opts.keepHistory ? [] : undefined
    this.directory = opts.directory
    this.maxFileCount = opts.maxFileCount ?? DEFAULT_MAX_FILE_COUNT
    this.maxFileSize = opts.maxFileSize
    this.captureSource = opts.captureSource ?? false

    this.sideChannel = deps.sideChannel ?? new StderrSideChannel()
    this.clock = deps.clock ?? systemClock
    this.fileSinkFactory = deps.fileSinkFactory ?? createRotatingFileSink
    this.environment = deps.environment ?? {}
    this.formatter = deps.formatter ?? new TextFormatter()
    this.sink = deps.sink ?? StreamSink.standardOutput({}, { sideChannel: this.sideChannel })

    if (opts.writeToFile) this.setWriteToFile(true)
  }

  get label(): string {
    return this.currentLabel
  }

  get level(): LogLevelName {
    return this.threshold
  }

  /** Number of accepted calls so far, and the sequence of the next one. */
  get messageCount(): number {
    return this.counter
  }

  /** Every line written so far, when history is kept. */
  get history(): readonly string[] | undefined {
    return this.lines ? [...this.lines] : undefined
  }

  get writeToFile(): boolean {
    return this.writingToFile
  }

  get activeSink(): Sink {
    return this.sink
  }

  debug(...values: LogValue[]): void {
    this.emit("debug", values, {}, this.debug)
  }

  info(...values: LogValue[]): void {
    this.emit("info", values, {}, this.info)
  }

  notice(...values: LogValue[]): void {
    this.emit("notice", values, {}, this.notice)
  }

  warning(...values: LogValue[]): void {
    this.emit("warning", values, {}, this.warning)
  }

  error(...values: LogValue[]): void {
    this.emit("error", values, {}, this.error)
  }

  log(level: LogLevelName, values: readonly LogValue[], meta: LogMeta = {}): void {
    this.emit(level, values, meta, this.log)
  }

  isLevelEnabled(level: LogLevelName): boolean {
    return isLevelAtLeast(level, this.threshold)
  }

  setLevel(level: LogLevelName): void {
    this.threshold = level
  }

  /**
   * @throws ConfigurationError when the label is blank.
   */
  setLabel(label: string): void {
    this.currentLabel = validateLabel(label)

    // File names follow the label.
    if (this.writingToFile) {
      const sink = this.buildFileSink()
      if (sink) this.sink = sink
    }
  }

  setFormatter(formatter: Formatter): void {
    this.formatter = formatter
  }

  /** Replace the output. The logger no longer counts as writing to file. */
  setSink(sink: Sink): void {
    this.sink = sink
    this.writingToFile = false
  }

  /**
   * Switch between a rotating file sink named after the label and standard
   * output.
   *
   * @returns whether the output changed. When the file sink can't be built
   * the failure is reported and the current sink stays.
   */
  setWriteToFile(enabled: boolean): boolean {
    if (enabled === this.writingToFile) return false

    if (!enabled) {
      this.sink = StreamSink.standardOutput({}, { sideChannel: this.sideChannel })
      this.writingToFile = false
      return true
    }

    const sink = this.buildFileSink()
    if (!sink) return false

    this.sink = sink
    this.writingToFile = true
    return true
  }

  /**
   * Rotate the active sink when it supports rotation.
   *
   * @returns whether a rotation was requested.
   */
  rotate(): boolean {
    if (!isRotatableSink(this.sink)) return false

    this.sink.rotate()
    return true
  }

  private emit(
    level: LogLevelName,
    values: readonly LogValue[],
    meta: LogMeta,
    entry: (...args: never[]) => unknown,
  ): void {
    if (!this.isLevelEnabled(level)) return

    const source = meta.source ?? (this.captureSource ? captureCallerLocation(entry) : undefined)

    const record: LogRecord = {
      label: this.currentLabel,
      sequence: this.counter,
      level,
      values,
      timestamp: this.clock.now(),
      ...(meta.err !== undefined && { err: meta.err }),
      ...(source && { source }),
    }

    let line: string
    try {
      line = this.formatter.format(record)
    } catch (err) {
      this.sideChannel.report("Can't format message, dropping it", err)
      return
    }
    this.counter++

    this.sink.write(`${line}\n`)
    this.lines?.push(line)
  }

  private buildFileSink(): Sink | undefined {
    try {
      let directory = this.directory

      if (directory === undefined) {
        directory = defaultLogDirectory(this.currentLabel, this.environment)
        if (!ensureLogDirectory(directory, this.sideChannel)) return undefined
      }

      return this.fileSinkFactory(
        {
          directory,
          name: this.currentLabel,
          maxFileCount: this.maxFileCount,
          ...(this.maxFileSize !== undefined && { maxFileSize: this.maxFileSize }),
        },
        { sideChannel: this.sideChannel },
      )
    } catch (err) {
      this.sideChannel.report("Can't write to file, keeping the current output", err)
      return undefined
    }
  }
}

export function createLogger(opts: LoggerOptions, deps: LoggerDeps = {}): SinkLogger {
  return new SinkLogger(opts, deps)
}
