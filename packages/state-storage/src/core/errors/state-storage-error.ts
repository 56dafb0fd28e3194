import type {
  ErrorContext,
  SerializedError,
  StateStorageErrorCode,
  StorageFailure,
} from "../../ports/error"
import { serializeError } from "./serialize-error"

export type StateStorageErrorOptions<C extends StateStorageErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class StateStorageError<C extends StateStorageErrorCode = StateStorageErrorCode>
  extends Error
  implements StorageFailure<C>
{
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: StateStorageErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
