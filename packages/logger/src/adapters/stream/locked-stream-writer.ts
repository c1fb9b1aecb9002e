import { AtomicsLock, type Lock, type Milliseconds } from "@logbook/lock"
import { writeFully } from "../../core/write-fully"
import { SinkIOError } from "../../errors/logger-error"
import type { SideChannel } from "../../ports/side-channel"
import { StderrSideChannel } from "../stderr/stderr-side-channel"

/**
 * - `always`: every message goes to the descriptor before `write` returns.
 * - `manual`: messages collect in memory until `flush()` is called,
 *   `bufferSize` bytes are pending, or the process exits.
 */
export type FlushMode = "always" | "manual"

export type LockedStreamWriterOptions = {
  fd: number
  flushMode?: FlushMode
  /** Pending bytes that trigger a flush in `manual` mode. */
  bufferSize?: number
  lockTimeoutMs?: Milliseconds
}

export type LockedStreamWriterDeps = {
  /** Lock shared by every writer of the same descriptor. */
  lock?: Lock
  sideChannel?: SideChannel
  write?: (fd: number, data: string) => void
}

const DEFAULT_BUFFER_SIZE = 64 * 1024
const DEFAULT_LOCK_TIMEOUT_MS = 1_000

/**
 * Writers of this thread that are not handed a lock share this one. Build an
 * {@link AtomicsLock} over a shared buffer to exclude other threads as well.
 */
export const defaultStreamLock: Lock = new AtomicsLock()

const unflushed = new Set<LockedStreamWriter>()
let exitHookInstalled = false

/** Flush every writer holding pending messages. Runs on process exit. */
export function flushPendingWriters(): void {
  for (const writer of unflushed) writer.flush()
}

function flushAtExit(writer: LockedStreamWriter): void {
  unflushed.add(writer)

  if (exitHookInstalled) return
  exitHookInstalled = true
  process.on("exit", flushPendingWriters)
}

export function streamLockKey(fd: number): string {
  return `fd:${fd}`
}

/**
 * Serializes writes to a shared OS stream so concurrent writers never
 * interleave bytes within a message.
 *
 * The descriptor is owned by the process and is never closed here.
 */
export class LockedStreamWriter {
  readonly fd: number
  readonly flushMode: FlushMode

  private readonly key: string
  private readonly bufferSize: number
  private readonly lockTimeoutMs: Milliseconds
  private readonly lock: Lock
  private readonly sideChannel: SideChannel
  private readonly writeRaw: (fd: number, data: string) => void

  private pending = ""

  constructor(opts: LockedStreamWriterOptions, deps: LockedStreamWriterDeps = {}) {
    this.fd = opts.fd
    this.flushMode = opts.flushMode ?? "always"
    this.key = streamLockKey(opts.fd)
    this.bufferSize = opts.bufferSize ?? DEFAULT_BUFFER_SIZE
    this.lockTimeoutMs = opts.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS
    this.lock = deps.lock ?? defaultStreamLock
    this.sideChannel = deps.sideChannel ?? new StderrSideChannel()
    this.writeRaw = deps.write ?? writeFully
  }

  write(message: string): void {
    if (this.flushMode === "always") {
      this.writeLocked(message)
      return
    }

    this.pending += message
    flushAtExit(this)

    if (Buffer.byteLength(this.pending, "utf8") >= this.bufferSize) {
      this.flush()
    }
  }

  flush(): void {
    unflushed.delete(this)
    if (this.pending.length === 0) return

    const data = this.pending
    this.pending = ""

    this.writeLocked(data)
  }

  private writeLocked(data: string): void {
    const lease = this.lock.acquire(this.key, { timeoutMs: this.lockTimeoutMs })

    if (!lease) {
      this.sideChannel.report(
        "Message dropped",
        new SinkIOError("lock", this.key, new Error(`Lock not acquired within ${this.lockTimeoutMs}ms`)),
      )
      return
    }

    try {
      this.writeRaw(this.fd, data)
    } catch (err) {
      this.sideChannel.report("Message dropped", new SinkIOError("write", this.key, err))
    } finally {
      lease.release()
    }
  }
}
