/**
 * Rotates each job index through its motion variants: 0, 1, …, modulus - 1, then back to 0.
 * Counters are kept per index for the life of the process.
 */
export class SlotCounter {
  private readonly counters = new Map<number, number>();

  constructor(readonly modulus = 3) {
    if (!Number.isInteger(modulus) || modulus < 1) {
      throw new RangeError(`Slot modulus must be a positive integer, received ${modulus}.`);
    }
  }

  /** Returns the slot to use for this dispatch of `index` and moves its counter on. */
  advance(index: number): number {
    const slot = this.peek(index);
    const next = slot + 1;
    this.counters.set(index, next >= this.modulus ? 0 : next);
    return slot;
  }

  /** The slot the next `advance(index)` will return. */
  peek(index: number): number {
    return this.counters.get(index) ?? 0;
  }

  snapshot(): Record<number, number> {
    return Object.fromEntries(this.counters);
  }
}
