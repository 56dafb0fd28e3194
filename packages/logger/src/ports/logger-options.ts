import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them but
 * are free to choose how they are implemented internally.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for human readability.
   *
   * @remarks
   * Intended for local development. Structured (JSON) output is preferred
   * wherever logs are ingested by a processor.
   */
  prettify?: boolean
}
