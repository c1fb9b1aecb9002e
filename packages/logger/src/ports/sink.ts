/**
 * Destination for formatted log lines.
 *
 * @remarks
 * `write` never throws. Sinks handle their own I/O failures and describe
 * them through a {@link SideChannel}, so a log call can never fail.
 */
export interface Sink {
  write(message: string): void
}

/** A sink whose output can be retired on demand. */
export interface RotatableSink extends Sink {
  rotate(): void
}

export function isRotatableSink(sink: Sink): sink is RotatableSink {
  return "rotate" in sink && typeof sink.rotate === "function"
}
