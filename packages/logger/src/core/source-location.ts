import { fileURLToPath } from "node:url"
import type { SourceLocation } from "../ports/log-record"

// `at fn (file:line:column)` or `at file:line:column`
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/

/**
 * Parse one line of a V8 stack trace.
 *
 * @returns `undefined` for frames without a position, such as `at <anonymous>`.
 */
export function parseStackFrame(frame: string): SourceLocation | undefined {
  const match = FRAME_PATTERN.exec(frame)
  if (!match) return undefined

  const [, fn, location, line, column] = match
  if (location === undefined || line === undefined || column === undefined) return undefined

  return {
    file: location.startsWith("file://") ? fileURLToPath(location) : location,
    line: Number(line),
    column: Number(column),
    ...(fn !== undefined && { fn }),
  }
}

/**
 * Location of the code that called `above`.
 */
export function captureCallerLocation(
  above: (...args: never[]) => unknown,
): SourceLocation | undefined {
  const holder: { stack?: string } = {}
  Error.captureStackTrace(holder, above)

  const frame = holder.stack?.split("\n").find((line) => line.trimStart().startsWith("at "))

  return frame === undefined ? undefined : parseStackFrame(frame)
}
