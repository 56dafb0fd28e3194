import { type Logger, NullLogger } from "@statekeep/logger"
import { describeArchive, readArchive, writeArchive } from "../adapters/io/archive-io"
import { systemRandom } from "../adapters/random"
import type { ArchiveFormat } from "../ports/archive-format"
import type { ArchiveHeader } from "../ports/archive-header"
import type { ArchiveSource, ArchiveTarget } from "../ports/archive-io"
import type { LoadResult, StoreResult } from "../ports/archive-result"
import type { RandomSource } from "../ports/random-source"
import type { StateSamplerAllocator } from "../ports/state-sampler"
import type { StateSpace } from "../ports/state-space"
import type { TextSink } from "../ports/text-sink"
import { decodeArchive, encodeArchive } from "./codec/archive-codec"
import { defaultArchiveFormat } from "./codec/archive-format"
import { createSamplerAllocator } from "./sampler/sampler-allocator"

export type StateStorageDeps = {
  logger?: Logger
  /** Randomness handed to samplers built by {@link StateStorage.getStateSamplerAllocator}. */
  random?: RandomSource
}

export type StateStorageOptions = {
  /** Integer layout of archives. Defaults to the host byte order with 8-byte sizes. */
  format?: ArchiveFormat
}

/**
 * An ordered collection of records owned on behalf of one state space, with
 * binary archive persistence.
 *
 * @remarks
 * Every record held was allocated by the bound space and is freed through it
 * by {@link clear}. Not safe for concurrent mutation: do not add, clear or
 * load while a `load`/`store` of the same collection is pending.
 */
export class StateStorage<R> {
  private readonly sequence: { generation: number; states: R[] } = {
    generation: 0,
    states: [],
  }
  private readonly logger: Logger
  private readonly random: RandomSource
  private readonly format: ArchiveFormat

  constructor(
    private readonly space: StateSpace<R>,
    deps: StateStorageDeps = {},
    options: StateStorageOptions = {},
  ) {
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "state-storage",
      space: space.name,
    })
    this.random = deps.random ?? systemRandom
    this.format = options.format ?? defaultArchiveFormat()
  }

  getSpace(): StateSpace<R> {
    return this.space
  }

  get size(): number {
    return this.sequence.states.length
  }

  getStates(): readonly R[] {
    return this.sequence.states
  }

  /** Appends `record`; the collection takes ownership of it. */
  addState(record: R): void {
    this.sequence.states.push(record)
  }

  /** Appends `count` records drawn from the space's own uniform sampler. */
  generateSamples(count: number): void {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new RangeError(`Sample count must be a non-negative integer, got ${count}`)
    }

    const sampler = this.space.allocDefaultSampler()

    for (let i = 0; i < count; i++) {
      const record = this.space.allocRecord()
      sampler.sampleUniform(record)
      this.addState(record)
    }
  }

  /**
   * Frees every record and empties the collection. Calling it on an empty
   * collection does nothing.
   */
  clear(): void {
    const states = this.sequence.states
    if (states.length === 0) return

    for (const record of states) {
      this.space.freeRecord(record)
    }

    states.length = 0
    this.sequence.generation++
  }

  dispose(): void {
    this.clear()
  }

  print(sink: TextSink): void {
    for (const record of this.sequence.states) {
      this.space.printRecord(record, sink)
    }
  }

  /** The archive bytes (header followed by body) for the current records. */
  encode(): Uint8Array {
    const { header, body } = encodeArchive(this.space, this.sequence.states, this.format)

    return Buffer.concat([header, body])
  }

  /**
   * Replaces the collection with the records of an archive.
   *
   * The collection is cleared first and stays empty when the archive is
   * unavailable or rejected.
   */
  async tryLoad(source: ArchiveSource): Promise<LoadResult> {
    const log = this.logger.child({ operation: "load", archive: describeArchive(source) })

    this.clear()

    const bytes = await readArchive(source)
    if (!bytes.ok) {
      log.warn("Unable to load states", { err: bytes.error })
      return { success: false, error: bytes.error }
    }

    const decoded = decodeArchive(bytes.value, this.space, this.format)
    if (!decoded.ok) {
      log.error(decoded.error.message, { err: decoded.error })
      return { success: false, error: decoded.error }
    }

    const { header, records } = decoded.value
    log.debug("Deserialized states", { recordCount: records.length })

    for (const record of records) {
      this.addState(record)
    }

    return { success: true, header, recordCount: records.length }
  }

  /** Like {@link tryLoad}, but throws the failure. */
  async load(source: ArchiveSource): Promise<ArchiveHeader> {
    const result = await this.tryLoad(source)

    if (!result.success) throw result.error

    return result.header
  }

  async tryStore(target: ArchiveTarget): Promise<StoreResult> {
    const log = this.logger.child({ operation: "store", archive: describeArchive(target) })
    const recordCount = this.sequence.states.length

    log.debug("Serializing states", { recordCount })

    const { header, body } = encodeArchive(this.space, this.sequence.states, this.format)
    const written = await writeArchive(target, [header, body])

    if (!written.ok) {
      log.warn("Unable to store states", { err: written.error })
      return { success: false, error: written.error }
    }

    log.debug("Stored states", { recordCount, bytesWritten: written.value })

    return { success: true, recordCount, bytesWritten: written.value }
  }

  /** Like {@link tryStore}, but throws the failure. Resolves to the bytes written. */
  async store(target: ArchiveTarget): Promise<number> {
    const result = await this.tryStore(target)

    if (!result.success) throw result.error

    return result.bytesWritten
  }

  /**
   * Returns an allocator of samplers that draw from the stored records.
   *
   * The current signature is captured now; the allocator rejects any target
   * space whose signature differs. Samplers read the live collection, which
   * must outlive them.
   */
  getStateSamplerAllocator(): StateSamplerAllocator<R> {
    return createSamplerAllocator(this.space.computeSignature(), this.sequence, {
      random: this.random,
    })
  }
}
