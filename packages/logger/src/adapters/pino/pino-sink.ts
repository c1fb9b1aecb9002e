import pino, { type DestinationStream, type Logger as PinoLoggerBase } from "pino"
import type { Sink } from "../../ports/sink"

export type PinoSinkDeps = {
  /**
   * Pino logger to forward to. When provided, this sink only adds its
   * bindings via `.child(...)`.
   */
  base?: PinoLoggerBase

  /** Destination for a logger built by the sink itself. */
  destination?: DestinationStream
}

export type PinoSinkOptions = {
  /** Bound to every entry as `label`. */
  label?: string
}

/**
 * Hands each formatted line to a pino logger at `info`, for hosts whose
 * output is owned by an external logging pipeline.
 *
 * Level filtering already happened upstream, so the child logger runs at
 * the lowest level and never drops a line, whatever the base's level.
 */
export class PinoSink implements Sink {
  protected readonly logger: PinoLoggerBase

  constructor(deps: PinoSinkDeps = {}, opts: PinoSinkOptions = {}) {
    const bindings = opts.label === undefined ? {} : { label: opts.label }

    this.logger = deps.base
      ? deps.base.child(bindings, { level: "trace" })
      : pino({ level: "trace" }, deps.destination ?? pino.destination(1)).child(bindings)
  }

  write(message: string): void {
    this.logger.info(message.replace(/\r?\n$/, ""))
  }
}
