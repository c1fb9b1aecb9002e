import { describeError } from "../../errors/describe-error"
import type { SideChannel } from "../../ports/side-channel"
import { writeFully } from "../../core/write-fully"

const STDERR_FD = 2

export type StderrSideChannelDeps = {
  /** Descriptor to write diagnostics to. */
  fd?: number
  write?: (fd: number, data: string) => void
}

/**
 * Writes one diagnostic line per failure to standard error:
 * `[logbook] <message>: <error description>`.
 */
export class StderrSideChannel implements SideChannel {
  private readonly fd: number
  private readonly writeLine: (fd: number, data: string) => void

  constructor(deps: StderrSideChannelDeps = {}) {
    this.fd = deps.fd ?? STDERR_FD
    this.writeLine = deps.write ?? writeFully
  }

  report(message: string, err?: unknown): void {
    const detail = err === undefined ? "" : `: ${describeError(err)}`

    try {
      this.writeLine(this.fd, `[logbook] ${message}${detail}\n`)
    } catch {
      // Nowhere left to report to: the diagnostic is dropped.
    }
  }
}

export function createStderrSideChannel(deps: StderrSideChannelDeps = {}): SideChannel {
  return new StderrSideChannel(deps)
}
