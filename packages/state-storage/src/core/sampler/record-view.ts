import { StaleSamplerError } from "../errors/errors"

/**
 * The live record sequence of a state collection together with a counter that
 * the collection bumps every time it frees its records.
 */
export interface RecordSequence<R> {
  readonly generation: number
  readonly states: readonly R[]
}

/**
 * Non-owning handle onto a collection's records.
 *
 * @remarks
 * The view never frees or copies records. It remembers the generation it was
 * created in and refuses access once the collection has been cleared (or
 * reloaded, which clears first); records appended since remain reachable
 * through the same sequence.
 */
export class RecordView<R> {
  private readonly generation: number

  constructor(private readonly sequence: RecordSequence<R>) {
    this.generation = sequence.generation
  }

  get isStale(): boolean {
    return this.sequence.generation !== this.generation
  }

  get(): readonly R[] {
    if (this.isStale) {
      throw new StaleSamplerError(this.generation, this.sequence.generation)
    }

    return this.sequence.states
  }
}
