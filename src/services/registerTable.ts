/**
 * Fixed-size table of signed 32-bit registers held by the simulator.
 */
export class RegisterTable {
  private readonly values: Int32Array;

  /** Called after a write that changed a register. */
  onChange: ((index: number, value: number) => void) | null = null;

  constructor(readonly size = 100) {
    this.values = new Int32Array(size);
  }

  has(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.size;
  }

  get(index: number): number {
    this.assertIndex(index);
    return this.values[index];
  }

  set(index: number, value: number): void {
    this.assertIndex(index);
    if (this.values[index] === value) {
      return;
    }
    this.values[index] = value;
    this.onChange?.(index, this.values[index]);
  }

  private assertIndex(index: number): void {
    if (!this.has(index)) {
      throw new RangeError(`Register ${index} out of range [0, ${this.size}).`);
    }
  }
}
