export {
  createRotatingFileSink,
  RotatingFileSink,
} from "./adapters/file/rotating-file-sink"
export type {
  RotatingFileSinkDeps,
  RotatingFileSinkOptions,
} from "./adapters/file/rotating-file-sink"
export { DEFAULT_ENV_PREFIX, EnvSource, envScope } from "./adapters/env/env-source"
export type { EnvSourceOptions } from "./adapters/env/env-source"
export { createJsonFormatter, JsonFormatter } from "./adapters/json/json-formatter"
export { MemorySink } from "./adapters/memory/memory-sink"
export type { MemorySinkOptions } from "./adapters/memory/memory-sink"
export { createNullSink, NullSink } from "./adapters/null/null-sink"
export { ObjectSource } from "./adapters/object/object-source"
export type { LoggerOverrides } from "./adapters/object/object-source"
export { PinoSink } from "./adapters/pino/pino-sink"
export type { PinoSinkDeps, PinoSinkOptions } from "./adapters/pino/pino-sink"
export {
  createStderrSideChannel,
  StderrSideChannel,
} from "./adapters/stderr/stderr-side-channel"
export type { StderrSideChannelDeps } from "./adapters/stderr/stderr-side-channel"
export {
  defaultStreamLock,
  flushPendingWriters,
  LockedStreamWriter,
  streamLockKey,
} from "./adapters/stream/locked-stream-writer"
export type {
  FlushMode,
  LockedStreamWriterDeps,
  LockedStreamWriterOptions,
} from "./adapters/stream/locked-stream-writer"
export { StreamSink } from "./adapters/stream/stream-sink"
export type { StreamSinkOptions } from "./adapters/stream/stream-sink"
export {
  createTextFormatter,
  DEFAULT_TEXT_FORMATTER_OPTIONS,
  TextFormatter,
} from "./adapters/text/text-formatter"
export type { TextFormatterOptions } from "./adapters/text/text-formatter"
export { loadLoggerConfig } from "./core/config/load-logger-config"
export type { LoadLoggerConfigOptions } from "./core/config/load-logger-config"
export { DEFAULT_PROVENANCE, LoggerConfig } from "./core/config/logger-config"
export { isConfigKey, logFormats, loggerConfigSchema } from "./core/config/logger-config-schema"
export type {
  LogFormat,
  LoggerConfigKey,
  LoggerConfigValues,
} from "./core/config/logger-config-schema"
export { createLoggerFromConfig } from "./core/config/logger-from-config"
export { validateLabel, validatePathLabel } from "./core/label"
export { defaultLogDirectory, ensureLogDirectory } from "./core/log-directory"
export type { LogDirectoryEnvironment } from "./core/log-directory"
export { createLogger, SinkLogger } from "./core/logger"
export type { FileSinkFactory, LoggerDeps } from "./core/logger"
export { captureCallerLocation, parseStackFrame } from "./core/source-location"
export { writeFully } from "./core/write-fully"
export { causeChain, describeError } from "./errors/describe-error"
export { ConfigurationError, LoggerError, SinkIOError } from "./errors/logger-error"
export type {
  ErrorContext,
  LoggerErrorCode,
  LoggerErrorOptions,
  SerializedLoggerError,
  SinkOperation,
} from "./errors/logger-error"
export type { ConfigSource } from "./ports/config-source"
export type { Formatter } from "./ports/formatter"
export {
  isLevelAtLeast,
  isLogLevelName,
  LEVEL_MARKER,
  LEVEL_SEVERITY,
  logLevelNames,
  LogLevels,
} from "./ports/log-level"
export type { LogLevel, LogLevelName } from "./ports/log-level"
export type { LogMeta, LogRecord, SourceLocation } from "./ports/log-record"
export { isLoggable, renderLogValue, renderLogValues } from "./ports/log-value"
export type { Loggable, LogValue } from "./ports/log-value"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export type { SideChannel } from "./ports/side-channel"
export { isRotatableSink } from "./ports/sink"
export type { RotatableSink, Sink } from "./ports/sink"
export type { TimeSource } from "./ports/time-source"
