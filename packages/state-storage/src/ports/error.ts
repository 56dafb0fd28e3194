export const stateStorageErrorCodes = [
  "io_unavailable",
  "bad_magic",
  "signature_mismatch",
  "truncated",
  "incompatible_space",
  "empty_collection",
  "stale_sampler",
] as const

export type StateStorageErrorCode = (typeof stateStorageErrorCodes)[number]

/**
 * Structured metadata attached to errors (signatures, byte counts, paths)
 * so diagnostics need no string parsing.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface StorageFailure<C extends StateStorageErrorCode = StateStorageErrorCode>
  extends Error {
  readonly code: C

  readonly context: ErrorContext

  /** `true` if retrying the same call might succeed (I/O only). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures such as a foreign or damaged archive,
   * `false` for misuse of the API (e.g. sampling after the collection was
   * cleared).
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
