const MAX_CAUSE_DEPTH = 10

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function describeOne(err: unknown): string {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? ` (${err.code})` : ""
    return `${err.name}${code}: ${err.message}`
  }

  if (typeof err === "string") return err

  try {
    return JSON.stringify(err) ?? String(err)
  } catch {
    return String(err)
  }
}

/**
 * Walk the cause chain of a thrown value, stopping at cycles and after
 * {@link MAX_CAUSE_DEPTH} links.
 */
export function causeChain(err: unknown): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < MAX_CAUSE_DEPTH) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    current = isRecord(current) && "cause" in current ? current.cause : undefined
  }

  return chain
}

/**
 * Render any thrown value and its causes on one line, outermost first:
 * `SinkIOError: Can't open '/x' <- Error (ENOENT): no such file`.
 */
export function describeError(err: unknown): string {
  return causeChain(err).map(describeOne).join(" <- ")
}
