import path from "node:path"
import dayjs from "dayjs"
import { describeError } from "../../errors/describe-error"
import type { Formatter } from "../../ports/formatter"
import { LEVEL_MARKER } from "../../ports/log-level"
import type { LogRecord, SourceLocation } from "../../ports/log-record"
import { renderLogValues } from "../../ports/log-value"

export type TextFormatterOptions = {
  /** `[label]`. Default `false`. */
  printLabel: boolean

  /** `[0007]`, the record's sequence number. Default `false`. */
  printSequence: boolean

  /** Timestamp rendered with {@link TextFormatterOptions.dateFormat}. Default `true`. */
  printDate: boolean

  /** `[INFO]`. Default `true`. */
  printLevel: boolean

  /** `[file line:column]` when the record carries a source location. Default `true`. */
  printSource: boolean

  /** Zero-padded width of the sequence number. Default `4`. */
  sequenceWidth: number

  /** dayjs format string, local time. Default `"HH:mm:ss.SSS"`. */
  dateFormat: string

  /** Joins the parts of a line. Default three spaces. */
  separator: string

  /** Longer lines are cut to this many characters and end in `...`. Default unbounded. */
  maxLineLength: number
}

export const DEFAULT_TEXT_FORMATTER_OPTIONS: Readonly<TextFormatterOptions> = Object.freeze({
  printLabel: false,
  printSequence: false,
  printDate: true,
  printLevel: true,
  printSource: true,
  sequenceWidth: 4,
  dateFormat: "HH:mm:ss.SSS",
  separator: "   ",
  maxLineLength: Number.POSITIVE_INFINITY,
})

/** Source file name without directory and extension. */
export function sourceFileName(file: string): string {
  return path.basename(file, path.extname(file))
}

function condenseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ")
}

export class TextFormatter implements Formatter {
  readonly options: Readonly<TextFormatterOptions>

  constructor(opts: Partial<TextFormatterOptions> = {}) {
    this.options = Object.freeze({ ...DEFAULT_TEXT_FORMATTER_OPTIONS, ...opts })
  }

  /** A copy with some options changed. */
  with(opts: Partial<TextFormatterOptions>): TextFormatter {
    return new TextFormatter({ ...this.options, ...opts })
  }

  format(record: LogRecord): string {
    const o = this.options
    const parts: string[] = []

    if (o.printLabel) parts.push(`[${record.label}]`)
    if (o.printSequence) parts.push(`[${String(record.sequence).padStart(o.sequenceWidth, "0")}]`)
    if (o.printDate) parts.push(dayjs(record.timestamp).format(o.dateFormat))
    if (o.printLevel) parts.push(`[${LEVEL_MARKER[record.level]}]`)
    if (o.printSource && record.source) parts.push(this.sourcePart(record.source))

    parts.push(renderLogValues(record.values))

    const err = condenseWhitespace(describeError(record.err))
    if (err) parts.push(err)

    const line = parts.join(o.separator)

    return truncate(line, o.maxLineLength)
  }

  private sourcePart(source: SourceLocation): string {
    return `[${sourceFileName(source.file)} ${source.line}:${source.column}]`
  }
}

export function createTextFormatter(opts: Partial<TextFormatterOptions> = {}): Formatter {
  return new TextFormatter(opts)
}

// Counts code points so a surrogate pair is never split.
function truncate(line: string, max: number): string {
  if (line.length <= max) return line

  const chars = Array.from(line)
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : line
}
