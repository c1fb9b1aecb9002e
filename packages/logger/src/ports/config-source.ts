/**
 * A source of raw configuration values.
 *
 * A source only loads values. Coercion and validation happen downstream,
 * and sources are applied in order so later ones override earlier ones.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. "env" or "object:overrides". */
  readonly name: string

  /** `undefined` for a key means the value is not provided. */
  load(): Promise<Record<string, unknown>>
}
