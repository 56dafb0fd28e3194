import { ARCHIVE_MARKER } from "../../ports/archive-header"
import type { ErrorContext } from "../../ports/error"
import type { Signature } from "../../ports/state-space"
import { formatSignature } from "../signature"
import { StateStorageError } from "./state-storage-error"

/** The source or target cannot be opened, read or written. */
export class IoUnavailableError extends StateStorageError<"io_unavailable"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, {
      code: "io_unavailable",
      isRetryable: true,
      ...options,
    })
  }
}

export class BadMagicError extends StateStorageError<"bad_magic"> {
  constructor(found: number) {
    super("The stored data does not start with the correct header", {
      code: "bad_magic",
      context: { expected: ARCHIVE_MARKER, found },
    })
  }
}

export class SignatureMismatchError extends StateStorageError<"signature_mismatch"> {
  constructor(message: string, context: ErrorContext) {
    super(message, { code: "signature_mismatch", context })
  }
}

/** Declared lengths exceed the bytes actually available. */
export class TruncatedArchiveError extends StateStorageError<"truncated"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "truncated", context })
  }
}

export class IncompatibleSpaceError extends StateStorageError<"incompatible_space"> {
  constructor(expected: Signature, actual: Signature, spaceName: string) {
    super(
      "Cannot allocate state sampler for a state space whose signature does not match " +
        `that of the stored states. Expected signature ${formatSignature(expected)} ` +
        `but space ${spaceName} has signature ${formatSignature(actual)}`,
      {
        code: "incompatible_space",
        context: { expected: [...expected], actual: [...actual], space: spaceName },
      },
    )
  }
}

export class EmptyCollectionError extends StateStorageError<"empty_collection"> {
  constructor(spaceName: string) {
    super("Empty set of states to sample from", {
      code: "empty_collection",
      context: { space: spaceName },
    })
  }
}

/** A sampler outlived the records it was built over. */
export class StaleSamplerError extends StateStorageError<"stale_sampler"> {
  constructor(capturedGeneration: number, currentGeneration: number) {
    super("The state collection was cleared after this sampler was allocated", {
      code: "stale_sampler",
      context: { capturedGeneration, currentGeneration },
      isOperational: false,
    })
  }
}
