import type { LoggerOptions } from "@statekeep/logger"
import { z } from "zod"
import { EnvSource } from "../../adapters/config/env-source"
import type { ArchiveFormat } from "../../ports/archive-format"
import type { IConfig } from "../../ports/config"
import type { ConfigSource } from "../../ports/config-source"
import { Config } from "./config"
import { type StateStorageSettings, stateStorageConfigSchema } from "./schema"

export type LoadStateStorageConfigOptions = {
  /**
   * Applied in order, later ones win. Defaults to `[new EnvSource()]`, the
   * only path through which `STATE_STORAGE_*` variables reach a collection.
   */
  sources?: ConfigSource[]
}

/**
 * Merges the given sources and validates the result.
 *
 * @example
 * ```ts
 * const config = await loadStateStorageConfig({
 *   sources: [new EnvSource(), new ObjectSource({ SIZE_WIDTH: 4 })],
 * })
 *
 * config.value.SIZE_WIDTH        // 4
 * config.explain("SIZE_WIDTH")   // "object:overrides"
 * ```
 */
export async function loadStateStorageConfig({
  sources,
}: LoadStateStorageConfigOptions = {}): Promise<IConfig<StateStorageSettings>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = stateStorageConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  for (const key of Object.keys(result.data)) {
    if (!(key in provenance)) {
      provenance[key] = "default"
    }
  }

  return new Config(result.data, provenance, new Set(Object.keys(merged)))
}

export function toArchiveFormat(config: IConfig<StateStorageSettings>): ArchiveFormat {
  return {
    byteOrder: config.value.BYTE_ORDER,
    sizeWidth: config.value.SIZE_WIDTH,
  }
}

export function toLoggerOptions(config: IConfig<StateStorageSettings>): LoggerOptions {
  return {
    level: config.value.LOG_LEVEL,
    prettify: config.value.LOG_PRETTY,
  }
}
