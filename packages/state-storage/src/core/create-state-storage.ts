import { createPinoLogger, type Logger } from "@statekeep/logger"
import type { ArchiveFormat } from "../ports/archive-format"
import type { IConfig } from "../ports/config"
import type { RandomSource } from "../ports/random-source"
import type { StateSpace } from "../ports/state-space"
import { toArchiveFormat, toLoggerOptions } from "./config/load-config"
import type { StateStorageSettings } from "./config/schema"
import { StateStorage } from "./state-storage"

export interface CreateStateStorageOptions<R> {
  space: StateSpace<R>
  /** Defaults to a pino logger built from `config`, or to no logging without one. */
  logger?: Logger
  random?: RandomSource
  /** Takes precedence over `config`. */
  format?: ArchiveFormat
  config?: IConfig<StateStorageSettings>
}

export function createStateStorage<R>(options: CreateStateStorageOptions<R>): StateStorage<R> {
  const { config } = options
  const format = options.format ?? (config ? toArchiveFormat(config) : undefined)
  const logger =
    options.logger ?? (config ? createPinoLogger({}, toLoggerOptions(config)) : undefined)

  return new StateStorage(
    options.space,
    {
      ...(logger && { logger }),
      ...(options.random && { random: options.random }),
    },
    { ...(format && { format }) },
  )
}
