import {
  closeSync,
  existsSync,
  openSync,
  readdirSync,
  renameSync,
  statSync,
  unlinkSync,
} from "node:fs"
import path from "node:path"
import { type Lock, type Milliseconds, MemoryLock } from "@logbook/lock"
import { writeFully } from "../../core/write-fully"
import { ConfigurationError, SinkIOError } from "../../errors/logger-error"
import type { SideChannel } from "../../ports/side-channel"
import type { RotatableSink } from "../../ports/sink"
import { StderrSideChannel } from "../stderr/stderr-side-channel"

export type RotatingFileSinkOptions = {
  /** Existing, writable directory that holds the log files. */
  directory: string

  /** Base name of the files: `<name>.<index>.log`. */
  name: string

  /** Rotated files kept besides the active one. */
  maxFileCount: number

  /** Rotate before writing once the active file holds this many bytes. */
  maxFileSize?: number

  lockTimeoutMs?: Milliseconds
}

export type RotatingFileSinkDeps = {
  /**
   * Serializes writes and rotations of this sink. Pass a shared lock when
   * several sinks, or several threads, append to the same files.
   */
  lock?: Lock
  sideChannel?: SideChannel
  rename?: (from: string, to: string) => void
}

const DEFAULT_LOCK_TIMEOUT_MS = 1_000

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Appends to `<directory>/<name>.0.log` and keeps up to `maxFileCount` older
 * generations as `<name>.1.log` (newest) through `<name>.<maxFileCount>.log`.
 *
 * @remarks
 * Every write opens, appends and closes the active file. No descriptor is
 * held between calls, so files can be moved or removed from outside at any
 * time.
 */
export class RotatingFileSink implements RotatableSink {
  readonly directory: string
  readonly name: string
  readonly maxFileCount: number
  readonly maxFileSize: number | undefined

  private readonly lockTimeoutMs: Milliseconds
  private readonly lock: Lock
  private readonly sideChannel: SideChannel
  private readonly rename: (from: string, to: string) => void
  private readonly indexPattern: RegExp

  /**
   * @throws ConfigurationError when the options are invalid.
   * @throws SinkIOError when the active file can't be created.
   */
  constructor(opts: RotatingFileSinkOptions, deps: RotatingFileSinkDeps = {}) {
    validateOptions(opts)

    this.directory = opts.directory
    this.name = opts.name
    this.maxFileCount = opts.maxFileCount
    this.maxFileSize = opts.maxFileSize
    this.lockTimeoutMs = opts.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS
    this.lock = deps.lock ?? new MemoryLock()
    this.sideChannel = deps.sideChannel ?? new StderrSideChannel()
    this.rename = deps.rename ?? renameSync
    this.indexPattern = new RegExp(`^${escapeRegExp(opts.name)}\\.(\\d+)\\.log$`)

    this.createActiveFile()
  }

  get activeFilePath(): string {
    return this.filePath(0)
  }

  filePath(index: number): string {
    return path.join(this.directory, `${this.name}.${index}.log`)
  }

  write(message: string): void {
    this.withSinkLock("write", () => {
      if (this.maxFileSize !== undefined && this.sizeOf(this.activeFilePath) >= this.maxFileSize) {
        this.rotateUnlocked()
      }

      this.append(message)
    })
  }

  rotate(): void {
    this.withSinkLock("rotate", () => this.rotateUnlocked())
  }

  private withSinkLock(action: string, fn: () => void): void {
    const lease = this.lock.acquire(this.activeFilePath, { timeoutMs: this.lockTimeoutMs })

    if (!lease) {
      this.sideChannel.report(
        `Skipped ${action}`,
        new SinkIOError(
          "lock",
          this.activeFilePath,
          new Error(`Lock not acquired within ${this.lockTimeoutMs}ms`),
        ),
      )
      return
    }

    try {
      fn()
    } finally {
      lease.release()
    }
  }

  private createActiveFile(): void {
    try {
      closeSync(openSync(this.activeFilePath, "a"))
    } catch (err) {
      throw new SinkIOError("create", this.activeFilePath, err)
    }
  }

  private append(message: string): void {
    let fd: number

    try {
      fd = openSync(this.activeFilePath, "a")
    } catch (err) {
      this.sideChannel.report("Message dropped", new SinkIOError("open", this.activeFilePath, err))
      return
    }

    try {
      writeFully(fd, message)
    } catch (err) {
      this.sideChannel.report("Message dropped", new SinkIOError("write", this.activeFilePath, err))
    } finally {
      this.closeQuietly(fd)
    }
  }

  private closeQuietly(fd: number): void {
    try {
      closeSync(fd)
    } catch (err) {
      this.sideChannel.report("Can't close log file", new SinkIOError("write", this.activeFilePath, err))
    }
  }

  /** Size in bytes, 0 when the file is missing or can't be read. */
  private sizeOf(file: string): number {
    try {
      return statSync(file, { throwIfNoEntry: false })?.size ?? 0
    } catch (err) {
      this.sideChannel.report("Can't read log file size", new SinkIOError("stat", file, err))
      return 0
    }
  }

  private rotateUnlocked(): void {
    if (this.sizeOf(this.activeFilePath) === 0) return

    if (!this.shiftFiles()) return

    this.deleteBeyondBound()

    try {
      this.createActiveFile()
    } catch (err) {
      this.sideChannel.report("Can't recreate active log file", err)
    }
  }

  /**
   * Move every file of the contiguous chain starting at index 0 up by one,
   * beginning with the oldest so no rename lands on an existing file.
   *
   * @returns `false` if a rename failed and the shift stopped part way.
   */
  private shiftFiles(): boolean {
    let free = 0
    while (existsSync(this.filePath(free))) free++

    for (let index = free - 1; index >= 0; index--) {
      const from = this.filePath(index)
      const to = this.filePath(index + 1)

      try {
        this.rename(from, to)
      } catch (err) {
        this.sideChannel.report(`Rotation stopped at '${from}'`, new SinkIOError("rename", from, err))
        return false
      }
    }

    return true
  }

  private deleteBeyondBound(): void {
    let entries: string[]

    try {
      entries = readdirSync(this.directory)
    } catch (err) {
      this.sideChannel.report("Can't list log directory", new SinkIOError("stat", this.directory, err))
      return
    }

    for (const entry of entries) {
      const match = this.indexPattern.exec(entry)
      if (!match?.[1] || Number(match[1]) <= this.maxFileCount) continue

      const file = path.join(this.directory, entry)

      try {
        unlinkSync(file)
      } catch (err) {
        this.sideChannel.report("Can't remove old log file", new SinkIOError("delete", file, err))
      }
    }
  }
}

function validateOptions(opts: RotatingFileSinkOptions): void {
  if (opts.name.trim().length === 0 || /[\\/]/.test(opts.name)) {
    throw new ConfigurationError(
      "invalid_config",
      `Invalid log file name ("${opts.name}"). Name must not be empty or contain path separators`,
      { name: opts.name },
    )
  }

  if (!Number.isInteger(opts.maxFileCount) || opts.maxFileCount < 0) {
    throw new ConfigurationError(
      "invalid_config",
      `maxFileCount must be a non-negative integer, got: ${opts.maxFileCount}`,
      { maxFileCount: opts.maxFileCount },
    )
  }

  if (
    opts.maxFileSize !== undefined &&
    (!Number.isInteger(opts.maxFileSize) || opts.maxFileSize <= 0)
  ) {
    throw new ConfigurationError(
      "invalid_config",
      `maxFileSize must be a positive integer, got: ${opts.maxFileSize}`,
      { maxFileSize: opts.maxFileSize },
    )
  }
}

export function createRotatingFileSink(
  opts: RotatingFileSinkOptions,
  deps: RotatingFileSinkDeps = {},
): RotatableSink {
  return new RotatingFileSink(opts, deps)
}
