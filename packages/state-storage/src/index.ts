export { DotenvSource, type DotenvSourceOptions } from "./adapters/config/dotenv-source"
export {
  DEFAULT_ENV_PREFIX,
  EnvSource,
  type EnvSourceOptions,
} from "./adapters/config/env-source"
export { ObjectSource } from "./adapters/config/object-source"
export { readArchive, writeArchive } from "./adapters/io/archive-io"
export { systemRandom } from "./adapters/random"
export {
  REAL_VECTOR_SPACE_TYPE,
  type RealVectorBounds,
  type RealVectorState,
  RealVectorStateSpace,
  type RealVectorStateSpaceOptions,
} from "./adapters/spaces/real-vector-state-space"
export {
  type DecodedArchive,
  decodeArchive,
  type EncodedArchive,
  encodeArchive,
} from "./core/codec/archive-codec"
export { defaultArchiveFormat, hostByteOrder } from "./core/codec/archive-format"
export {
  archiveHeaderLength,
  decodeArchiveHeader,
  encodeArchiveHeader,
} from "./core/codec/archive-header-codec"
export { ByteReader } from "./core/codec/byte-reader"
export { decodeRecords, encodeRecords } from "./core/codec/record-stream-codec"
export {
  type LoadStateStorageConfigOptions,
  loadStateStorageConfig,
  toArchiveFormat,
  toLoggerOptions,
} from "./core/config/load-config"
export { type StateStorageSettings, stateStorageConfigSchema } from "./core/config/schema"
export {
  type CreateStateStorageOptions,
  createStateStorage,
} from "./core/create-state-storage"
export {
  BadMagicError,
  EmptyCollectionError,
  IncompatibleSpaceError,
  IoUnavailableError,
  SignatureMismatchError,
  StaleSamplerError,
  TruncatedArchiveError,
} from "./core/errors/errors"
export { isStateStorageError } from "./core/errors/is-state-storage-error"
export { type SerializeOptions, serializeError } from "./core/errors/serialize-error"
export {
  StateStorageError,
  type StateStorageErrorOptions,
} from "./core/errors/state-storage-error"
export { PrecomputedStateSampler } from "./core/sampler/precomputed-state-sampler"
export { type RecordSequence, RecordView } from "./core/sampler/record-view"
export {
  createSamplerAllocator,
  type SamplerAllocatorOptions,
} from "./core/sampler/sampler-allocator"
export {
  compareSignatures,
  formatSignature,
  type SignatureComparison,
  signaturesEqual,
} from "./core/signature"
export {
  StateStorage,
  type StateStorageDeps,
  type StateStorageOptions,
} from "./core/state-storage"
export type { ArchiveFormat, ByteOrder, SizeWidth } from "./ports/archive-format"
export { ARCHIVE_MARKER, type ArchiveHeader } from "./ports/archive-header"
export type { ArchiveSource, ArchiveTarget } from "./ports/archive-io"
export type {
  ArchiveFailure,
  ArchiveOutcome,
  ArchiveSuccess,
  FailedLoadResult,
  FailedStoreResult,
  LoadResult,
  StoreResult,
  SuccessfulLoadResult,
  SuccessfulStoreResult,
} from "./ports/archive-result"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/config-source"
export {
  type ErrorContext,
  type SerializedError,
  type StateStorageErrorCode,
  type StorageFailure,
  stateStorageErrorCodes,
} from "./ports/error"
export type { RandomSource } from "./ports/random-source"
export type { StateSampler, StateSamplerAllocator } from "./ports/state-sampler"
export type { Signature, StateSpace } from "./ports/state-space"
export type { TextSink } from "./ports/text-sink"
