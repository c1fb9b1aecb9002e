import { describeError } from "../../errors/describe-error"
import type { Formatter } from "../../ports/formatter"
import type { LogRecord } from "../../ports/log-record"
import { renderLogValues } from "../../ports/log-value"

/** One JSON object per line, for hosts that ingest logs by machine. */
export class JsonFormatter implements Formatter {
  format(record: LogRecord): string {
    const payload: Record<string, unknown> = {
      timestamp: record.timestamp.toISOString(),
      level: record.level,
      label: record.label,
      sequence: record.sequence,
      message: renderLogValues(record.values),
      ...(record.source && { source: record.source }),
      ...(record.err !== undefined && { err: describeError(record.err) }),
    }

    return JSON.stringify(payload)
  }
}

export function createJsonFormatter(): Formatter {
  return new JsonFormatter()
}
