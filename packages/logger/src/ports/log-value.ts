/**
 * A value that knows how to render itself into a log line.
 */
export interface Loggable {
  toLogString(): string
}

/**
 * One element of a log call's payload.
 *
 * `null` and `undefined` are accepted so optional values can be passed
 * straight through; they render to nothing and are skipped.
 */
export type LogValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | Date
  | Error
  | Loggable

export function isLoggable(value: unknown): value is Loggable {
  return (
    typeof value === "object" &&
    value !== null &&
    "toLogString" in value &&
    typeof value.toLogString === "function"
  )
}

export function renderLogValue(value: LogValue): string | undefined {
  if (value === null || value === undefined) return undefined
  if (typeof value === "string") return value
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString()
  }
  if (value instanceof Error) return `${value.name}: ${value.message}`
  if (isLoggable(value)) return renderLoggable(value)

  return String(value)
}

function renderLoggable(value: Loggable): string {
  try {
    return value.toLogString()
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    return `<toLogString failed: ${reason}>`
  }
}

export function renderLogValues(values: readonly LogValue[]): string {
  const parts: string[] = []

  for (const value of values) {
    const rendered = renderLogValue(value)
    if (rendered !== undefined) parts.push(rendered)
  }

  return parts.join(" ")
}
