import type { ConfigSource } from "../../ports/config-source"

export const DEFAULT_ENV_PREFIX = "LOGBOOK_"

export type EnvSourceOptions = {
  /** Only variables starting with this prefix are read, with the prefix removed. */
  prefix?: string

  /**
   * Also read `<prefix><LABEL>_<KEY>` variables, which win over the
   * unscoped `<prefix><KEY>`. Lets one environment configure several
   * loggers, e.g. `LOGBOOK_BILLING_LEVEL=error`.
   */
  label?: string

  env?: Record<string, string | undefined>
}

/** `"billing-api"` becomes `"BILLING_API_"`. */
export function envScope(label: string): string {
  return `${label.toUpperCase().replace(/[^A-Z0-9]+/g, "_")}_`
}

/** Logger settings from `LOGBOOK_*` environment variables. */
export class EnvSource implements ConfigSource {
  readonly name: string

  private readonly prefix: string
  private readonly scoped: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.scoped = options.label === undefined ? undefined : this.prefix + envScope(options.label)
    this.env = options.env ?? process.env
    this.name = this.scoped === undefined ? "env" : `env:${this.scoped}`
  }

  async load(): Promise<Record<string, string>> {
    const global: Record<string, string> = {}
    const scoped: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined) continue

      if (this.scoped !== undefined && key.startsWith(this.scoped)) {
        scoped[key.slice(this.scoped.length)] = value
      } else if (key.startsWith(this.prefix)) {
        global[key.slice(this.prefix.length)] = value
      }
    }

    return { ...global, ...scoped }
  }
}
