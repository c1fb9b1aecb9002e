import { writeSync } from "node:fs"

const MAX_EAGAIN_RETRIES = 100

function isAgain(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EAGAIN"
}

/**
 * Write every byte of `data` to `fd`, continuing after partial writes.
 *
 * Non-blocking pipes may answer `EAGAIN` while full; the write is retried a
 * bounded number of times before the error is rethrown.
 */
export function writeFully(fd: number, data: string): void {
  const buffer = Buffer.from(data, "utf8")
  let offset = 0
  let retries = 0

  while (offset < buffer.length) {
    try {
      offset += writeSync(fd, buffer, offset, buffer.length - offset)
      retries = 0
    } catch (err) {
      if (!isAgain(err) || retries >= MAX_EAGAIN_RETRIES) throw err
      retries++
    }
  }
}
