/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen downstream.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance.
   * Example: "env:STATE_STORAGE_", "object:overrides"
   */
  readonly name: string

  /** Returning undefined for a key means "value not provided". */
  load(): Promise<Record<string, unknown>>
}
