import type { StateSampler } from "./state-sampler"
import type { TextSink } from "./text-sink"

/**
 * Ordered integers identifying the structure of a state space.
 *
 * `signature[0]` holds the number of elements that follow it. Two spaces are
 * binary-compatible iff their signatures are equal element-wise.
 */
export type Signature = readonly number[]

/**
 * The state-space contract consumed by state storage.
 *
 * @typeParam R - The record (state) type the space allocates.
 *
 * @remarks
 * Records are fixed-length for a given space: `serialize` must write exactly
 * `getSerializationLength()` bytes and `deserialize` reads the same amount.
 */
export interface StateSpace<R> {
  readonly name: string

  computeSignature(): number[]

  getSerializationLength(): number

  serialize(target: Uint8Array, record: R): void

  deserialize(record: R, source: Uint8Array): void

  allocRecord(): R

  freeRecord(record: R): void

  copyRecord(destination: R, source: R): void

  /** The space's own uniform sampler, used to generate fresh records. */
  allocDefaultSampler(): StateSampler<R>

  printRecord(record: R, sink: TextSink): void
}
