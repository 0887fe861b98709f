const COMPACTION_MIN_HEAD = 32;

/**
 * FIFO backed by an append-only array and a head cursor. `shift` advances the
 * cursor instead of splicing; the consumed prefix is reclaimed once the head
 * passes half of the backing array (and at least {@link COMPACTION_MIN_HEAD}
 * slots).
 */
export class FifoQueue<T> {
  private items: (T | undefined)[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.head >= this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
  }

  /**
   * Linear scan from the head forward. Queues are drained every cycle, so
   * they stay short enough for this to be the cheaper option.
   */
  includes(item: T): boolean {
    for (let index = this.head; index < this.items.length; index += 1) {
      if (this.items[index] === item) {
        return true;
      }
    }
    return false;
  }

  shift(): T | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }
    const item = this.items[this.head];
    // Release the reference so consumed targets can be collected.
    this.items[this.head] = undefined;
    this.head += 1;

    if (this.head >= this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (
      this.head >= COMPACTION_MIN_HEAD &&
      this.head * 2 >= this.items.length
    ) {
      this.compact();
    }

    return item;
  }

  /**
   * Removes and returns every queued item in FIFO order.
   */
  drain(): T[] {
    const drained: T[] = [];
    for (let index = this.head; index < this.items.length; index += 1) {
      const item = this.items[index];
      if (item !== undefined) {
        drained.push(item);
      }
    }
    this.items = [];
    this.head = 0;
    return drained;
  }

  toArray(): T[] {
    const snapshot: T[] = [];
    for (let index = this.head; index < this.items.length; index += 1) {
      const item = this.items[index];
      if (item !== undefined) {
        snapshot.push(item);
      }
    }
    return snapshot;
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }

  /** Length of the backing array, including consumed slots. */
  getBackingLength(): number {
    return this.items.length;
  }

  private compact(): void {
    this.items = this.items.slice(this.head);
    this.head = 0;
  }
}
