import type { Sink } from "../../ports/sink"

export type MemorySinkOptions = {
  /** Oldest messages are dropped beyond this count. Unbounded when omitted. */
  limit?: number
}

/** Keeps written messages in memory, oldest first. */
export class MemorySink implements Sink {
  private readonly captured: string[] = []
  private readonly limit: number

  constructor(opts: MemorySinkOptions = {}) {
    this.limit = opts.limit ?? Number.POSITIVE_INFINITY
  }

  write(message: string): void {
    this.captured.push(message)

    if (this.captured.length > this.limit) {
      this.captured.splice(0, this.captured.length - this.limit)
    }
  }

  get messages(): readonly string[] {
    return [...this.captured]
  }

  clear(): void {
    this.captured.length = 0
  }
}
