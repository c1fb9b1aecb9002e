import type { Sink } from "../../ports/sink"

export class NullSink implements Sink {
  write(_message: string): void {}
}

export function createNullSink(): Sink {
  return new NullSink()
}
