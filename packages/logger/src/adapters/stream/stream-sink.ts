import type { Sink } from "../../ports/sink"
import {
  LockedStreamWriter,
  type LockedStreamWriterDeps,
  type LockedStreamWriterOptions,
} from "./locked-stream-writer"

const STDOUT_FD = 1
const STDERR_FD = 2

export type StreamSinkOptions = Omit<LockedStreamWriterOptions, "fd">

/** Sink that writes to a process stream through a {@link LockedStreamWriter}. */
export class StreamSink implements Sink {
  constructor(private readonly writer: LockedStreamWriter) {}

  static standardOutput(
    opts: StreamSinkOptions = {},
    deps: LockedStreamWriterDeps = {},
  ): StreamSink {
    return new StreamSink(new LockedStreamWriter({ ...opts, fd: STDOUT_FD }, deps))
  }

  static standardError(
    opts: StreamSinkOptions = {},
    deps: LockedStreamWriterDeps = {},
  ): StreamSink {
    return new StreamSink(new LockedStreamWriter({ ...opts, fd: STDERR_FD }, deps))
  }

  get fd(): number {
    return this.writer.fd
  }

  write(message: string): void {
    this.writer.write(message)
  }

  flush(): void {
    this.writer.flush()
  }
}
