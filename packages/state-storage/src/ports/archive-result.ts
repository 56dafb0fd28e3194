import type { ArchiveHeader } from "./archive-header"
import type { StorageFailure } from "./error"

export type ArchiveSuccess<T> = {
  readonly ok: true
  readonly value: T
}

export type ArchiveFailure<E = StorageFailure> = {
  readonly ok: false
  readonly error: E
}

/** Outcome of a single decoding step. */
export type ArchiveOutcome<T, E = StorageFailure> = ArchiveSuccess<T> | ArchiveFailure<E>

export type SuccessfulLoadResult = {
  success: true
  header: ArchiveHeader
  recordCount: number
}

export type FailedLoadResult = {
  success: false
  error: StorageFailure
}

export type LoadResult = SuccessfulLoadResult | FailedLoadResult

export type SuccessfulStoreResult = {
  success: true
  recordCount: number
  bytesWritten: number
}

export type FailedStoreResult = {
  success: false
  error: StorageFailure
}

export type StoreResult = SuccessfulStoreResult | FailedStoreResult
