import type { StateSpace } from "./state-space"

export interface StateSampler<R> {
  /** Overwrite `record` with a uniformly drawn state. */
  sampleUniform(record: R): void
}

/**
 * Builds a sampler for the given space. Allocators are handed around in place
 * of samplers so that the consumer decides which space a sampler is bound to.
 */
export type StateSamplerAllocator<R> = (space: StateSpace<R>) => StateSampler<R>
