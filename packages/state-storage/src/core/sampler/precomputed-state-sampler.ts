import assert from "node:assert"
import { systemRandom } from "../../adapters/random"
import type { RandomSource } from "../../ports/random-source"
import type { StateSampler } from "../../ports/state-sampler"
import type { StateSpace } from "../../ports/state-space"
import { EmptyCollectionError } from "../errors/errors"
import type { RecordView } from "./record-view"

/**
 * Draws uniformly, with replacement, among the records that were stored when
 * the sampler was constructed, copying the chosen one into the caller's record.
 */
export class PrecomputedStateSampler<R> implements StateSampler<R> {
  private readonly count: number

  constructor(
    private readonly space: StateSpace<R>,
    private readonly view: RecordView<R>,
    private readonly random: RandomSource = systemRandom,
  ) {
    this.count = view.get().length

    if (this.count === 0) {
      throw new EmptyCollectionError(space.name)
    }
  }

  sampleUniform(record: R): void {
    const states = this.view.get()
    const source = states[Math.floor(this.random.next() * this.count)]

    assert(source !== undefined, "Sampled index must fall within the stored states")

    this.space.copyRecord(record, source)
  }
}
