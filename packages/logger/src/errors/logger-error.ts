export type LoggerErrorCode = "invalid_label" | "invalid_config" | "sink_io"

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (paths, inputs, etc.) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type LoggerErrorOptions<C extends LoggerErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export type SerializedLoggerError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
}>

export class LoggerError<C extends LoggerErrorCode = LoggerErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext

  /**
   * `true` for expected runtime failures (disk full, missing directory),
   * `false` for programmer errors such as an invalid label.
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: LoggerErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedLoggerError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      timestamp: this.timestamp.toISOString(),
      isOperational: this.isOperational,
    }
  }
}

/**
 * Invalid logger configuration. A precondition violation on the caller's
 * side, thrown rather than reported.
 */
export class ConfigurationError extends LoggerError<"invalid_label" | "invalid_config"> {
  constructor(
    code: "invalid_label" | "invalid_config",
    message: string,
    context: ErrorContext = {},
  ) {
    super(message, { code, context, isOperational: false })
  }
}

export type SinkOperation = "create" | "open" | "write" | "stat" | "rename" | "delete" | "lock"

/** A sink's file or stream operation failed. */
export class SinkIOError extends LoggerError<"sink_io"> {
  readonly operation: SinkOperation
  readonly path: string

  constructor(operation: SinkOperation, path: string, cause?: unknown) {
    super(`Can't ${operation} '${path}'`, {
      code: "sink_io",
      context: { operation, path },
      cause,
    })

    this.operation = operation
    this.path = path
  }
}
