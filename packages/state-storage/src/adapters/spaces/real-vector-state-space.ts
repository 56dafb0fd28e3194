import { systemRandom } from "../random"
import type { RandomSource } from "../../ports/random-source"
import type { StateSampler } from "../../ports/state-sampler"
import type { StateSpace } from "../../ports/state-space"
import type { TextSink } from "../../ports/text-sink"

/** Type code written into the signature of real vector spaces. */
export const REAL_VECTOR_SPACE_TYPE = 1

const BYTES_PER_VALUE = 8

export type RealVectorState = {
  values: Float64Array
}

export type RealVectorBounds = {
  low: readonly number[]
  high: readonly number[]
}

export type RealVectorStateSpaceOptions = {
  dimension: number
  bounds: RealVectorBounds
  name?: string
  random?: RandomSource
}

/**
 * An n-dimensional box of real numbers.
 *
 * Signature: `[2, REAL_VECTOR_SPACE_TYPE, dimension]`. Records serialize to
 * `dimension` little-endian float64 values.
 */
export class RealVectorStateSpace implements StateSpace<RealVectorState> {
  readonly name: string
  readonly dimension: number
  private readonly low: readonly number[]
  private readonly high: readonly number[]
  private readonly random: RandomSource

  constructor(options: RealVectorStateSpaceOptions) {
    const { dimension, bounds } = options

    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`Dimension must be a positive integer, got ${dimension}`)
    }
    if (bounds.low.length !== dimension || bounds.high.length !== dimension) {
      throw new RangeError(`Bounds must have exactly ${dimension} entries per side`)
    }
    bounds.low.forEach((low, i) => {
      const high = bounds.high[i] ?? Number.NaN
      if (!(low <= high)) {
        throw new RangeError(`Lower bound ${low} exceeds upper bound ${high} on axis ${i}`)
      }
    })

    this.dimension = dimension
    this.low = [...bounds.low]
    this.high = [...bounds.high]
    this.name = options.name ?? `RealVectorSpace${dimension}`
    this.random = options.random ?? systemRandom
  }

  computeSignature(): number[] {
    return [2, REAL_VECTOR_SPACE_TYPE, this.dimension]
  }

  getSerializationLength(): number {
    return this.dimension * BYTES_PER_VALUE
  }

  serialize(target: Uint8Array, record: RealVectorState): void {
    const view = new DataView(target.buffer, target.byteOffset, target.byteLength)

    record.values.forEach((value, i) => {
      view.setFloat64(i * BYTES_PER_VALUE, value, true)
    })
  }

  deserialize(record: RealVectorState, source: Uint8Array): void {
    const view = new DataView(source.buffer, source.byteOffset, source.byteLength)

    for (let i = 0; i < this.dimension; i++) {
      record.values[i] = view.getFloat64(i * BYTES_PER_VALUE, true)
    }
  }

  allocRecord(): RealVectorState {
    return { values: new Float64Array(this.dimension) }
  }

  /** Poisons the values so that a record used after release is easy to spot. */
  freeRecord(record: RealVectorState): void {
    record.values.fill(Number.NaN)
  }

  copyRecord(destination: RealVectorState, source: RealVectorState): void {
    destination.values.set(source.values)
  }

  allocDefaultSampler(): StateSampler<RealVectorState> {
    return {
      sampleUniform: (record) => {
        for (let i = 0; i < this.dimension; i++) {
          const low = this.low[i] ?? 0
          const high = this.high[i] ?? 0
          record.values[i] = low + this.random.next() * (high - low)
        }
      },
    }
  }

  printRecord(record: RealVectorState, sink: TextSink): void {
    sink.write(`RealVectorState [${Array.from(record.values).join(" ")}]\n`)
  }
}
