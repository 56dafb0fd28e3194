import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/config-source"
import { DEFAULT_ENV_PREFIX } from "./env-source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /** When false, a missing file yields no values instead of throwing. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** Same filtering as {@link EnvSource}: only prefixed keys, prefix stripped. */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
    this.prefix = opts.prefix ?? DEFAULT_ENV_PREFIX
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && (err as NodeJS.ErrnoException).code === "ENOENT") {
        return {}
      }
      throw err
    }

    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(parse(content))) {
      if (key.startsWith(this.prefix)) {
        values[key.slice(this.prefix.length)] = value
      }
    }

    return values
  }
}
