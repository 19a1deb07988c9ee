/**
 * Fixed-capacity FIFO ring of latency samples.
 *
 * Appending to a full window overwrites the oldest slot, so eviction is O(1).
 */
export class SampleWindow {
  private readonly buffer: number[];
  private head = 0; // index of the oldest sample
  private count = 0;

  constructor(private readonly capacity: number) {
    this.buffer = new Array<number>(capacity);
  }

  public get size(): number {
    return this.count;
  }

  public push(value: number): void {
    if (this.count < this.capacity) {
      this.buffer[(this.head + this.count) % this.capacity] = value;
      this.count += 1;
      return;
    }

    this.buffer[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
  }

  /**
   * Copy of the samples, oldest first.
   */
  public toArray(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const value = this.buffer[(this.head + i) % this.capacity];
      if (value !== undefined) {
        out.push(value);
      }
    }
    return out;
  }
}
