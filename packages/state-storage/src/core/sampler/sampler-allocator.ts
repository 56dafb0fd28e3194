import type { RandomSource } from "../../ports/random-source"
import type { StateSampler, StateSamplerAllocator } from "../../ports/state-sampler"
import type { Signature, StateSpace } from "../../ports/state-space"
import { IncompatibleSpaceError } from "../errors/errors"
import { compareSignatures } from "../signature"
import { PrecomputedStateSampler } from "./precomputed-state-sampler"
import { type RecordSequence, RecordView } from "./record-view"

export type SamplerAllocatorOptions = {
  random?: RandomSource
}

/**
 * Binds `expected` and `sequence` into an allocator. The allocator checks the
 * target space's signature when it is invoked, so an incompatible space is
 * rejected before any sampler exists.
 *
 * @remarks
 * Each sampler gets its own {@link RecordView}, opened when the sampler is
 * constructed. The owning collection must outlive its samplers; clearing it
 * makes later draws throw `StaleSamplerError`.
 */
export function createSamplerAllocator<R>(
  expected: Signature,
  sequence: RecordSequence<R>,
  options: SamplerAllocatorOptions = {},
): StateSamplerAllocator<R> {
  const captured = [...expected]

  return (space: StateSpace<R>): StateSampler<R> => {
    const actual = space.computeSignature()

    if (!compareSignatures(captured, actual).match) {
      throw new IncompatibleSpaceError(captured, actual, space.name)
    }

    return new PrecomputedStateSampler(space, new RecordView(sequence), options.random)
  }
}
