/**
 * Validated configuration with provenance.
 *
 * @typeParam T - The validated shape, inferred from the zod schema.
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that provided the final value for `key`, or
   * "default" when the schema default applied.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of every source that contributed at least one value, in order. */
  sourcesUsed(): string[]

  /** Keys present in sources but not defined in the schema (typos, stale settings). */
  unknownKeys(): string[]
}
