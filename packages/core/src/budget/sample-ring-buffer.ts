/**
 * Fixed-capacity ring buffer of cycle durations. A running sum is adjusted on
 * every insertion and eviction so the mean is available in O(1).
 */
export class SampleRingBuffer {
  private readonly samples: Float64Array;
  private writeIndex = 0;
  private sizeValue = 0;
  private runningSum = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(
        `SampleRingBuffer capacity must be a positive integer (received ${capacity}).`,
      );
    }
    this.samples = new Float64Array(capacity);
  }

  get size(): number {
    return this.sizeValue;
  }

  get sum(): number {
    return this.runningSum;
  }

  /**
   * Appends a sample, evicting the oldest one once the buffer is full.
   * Returns the evicted sample, if any.
   */
  push(sample: number): number | undefined {
    let evicted: number | undefined;
    if (this.sizeValue === this.capacity) {
      evicted = this.samples[this.writeIndex];
      this.runningSum -= evicted;
    } else {
      this.sizeValue += 1;
    }

    this.samples[this.writeIndex] = sample;
    this.runningSum += sample;
    this.writeIndex = (this.writeIndex + 1) % this.capacity;

    if (this.sizeValue === this.capacity && this.writeIndex === 0) {
      // Re-derive the sum once per lap; incremental updates drift.
      this.runningSum = this.recomputeSum();
    }

    return evicted;
  }

  mean(): number {
    return this.sizeValue === 0 ? 0 : this.runningSum / this.sizeValue;
  }

  /**
   * Copies the retained samples, oldest first.
   */
  toArray(): number[] {
    const result: number[] = [];
    const startIndex = this.sizeValue === this.capacity ? this.writeIndex : 0;
    for (let offset = 0; offset < this.sizeValue; offset += 1) {
      result.push(this.samples[(startIndex + offset) % this.capacity]);
    }
    return result;
  }

  clear(): void {
    this.samples.fill(0);
    this.writeIndex = 0;
    this.sizeValue = 0;
    this.runningSum = 0;
  }

  private recomputeSum(): number {
    let total = 0;
    for (let index = 0; index < this.sizeValue; index += 1) {
      total += this.samples[index];
    }
    return total;
  }
}
