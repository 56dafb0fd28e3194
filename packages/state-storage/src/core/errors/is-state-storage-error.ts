import {
  type StateStorageErrorCode,
  type StorageFailure,
  stateStorageErrorCodes,
} from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isErrorCode(v: unknown): v is StateStorageErrorCode {
  return stateStorageErrorCodes.some((code) => code === v)
}

/**
 * Type guard for failures raised by state storage. Structural, so it also
 * recognizes errors thrown by another copy of this package.
 *
 * @example
 * ```ts
 * try {
 *   await storage.load("states.bin")
 * } catch (err) {
 *   if (isStateStorageError(err, "signature_mismatch")) {
 *     // archive belongs to another space
 *   }
 * }
 * ```
 */
export function isStateStorageError<C extends StateStorageErrorCode>(
  e: unknown,
  code?: C,
): e is StorageFailure<C> {
  if (!(e instanceof Error)) return false
  if (!("code" in e) || !isErrorCode(e.code)) return false
  if (code !== undefined && e.code !== code) return false

  return (
    "context" in e &&
    isRecord(e.context) &&
    "isOperational" in e &&
    typeof e.isOperational === "boolean" &&
    "isRetryable" in e &&
    typeof e.isRetryable === "boolean" &&
    "timestamp" in e &&
    e.timestamp instanceof Date
  )
}
