import type { ConfigSource } from "../../ports/config-source"

export const DEFAULT_ENV_PREFIX = "STATE_STORAGE_"

export type EnvSourceOptions = {
  /** Only variables starting with this prefix are read, with the prefix stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.env = options.env ?? process.env
    this.name = `env:${this.prefix}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }
}
