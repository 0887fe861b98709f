import { describe, expect, it } from 'vitest';

import { FifoQueue } from './fifo-queue.js';

interface Item {
  readonly id: number;
}

function createItems(count: number): Item[] {
  return Array.from({ length: count }, (_, id) => ({ id }));
}

describe('FifoQueue', () => {
  it('returns items in insertion order', () => {
    const queue = new FifoQueue<Item>();
    const [first, second, third] = createItems(3);
    queue.push(first);
    queue.push(second);
    queue.push(third);

    expect(queue.size).toBe(3);
    expect(queue.shift()).toBe(first);
    expect(queue.shift()).toBe(second);
    expect(queue.shift()).toBe(third);
    expect(queue.shift()).toBeUndefined();
    expect(queue.isEmpty()).toBe(true);
  });

  it('only reports membership for items at or after the head', () => {
    const queue = new FifoQueue<Item>();
    const [first, second] = createItems(2);
    queue.push(first);
    queue.push(second);

    queue.shift();

    expect(queue.includes(first)).toBe(false);
    expect(queue.includes(second)).toBe(true);
  });

  it('compacts the backing array once the head passes the threshold', () => {
    const queue = new FifoQueue<Item>();
    const items = createItems(40);
    for (const item of items) {
      queue.push(item);
    }

    for (let index = 0; index < 31; index += 1) {
      queue.shift();
    }
    expect(queue.getBackingLength()).toBe(40);
    expect(queue.size).toBe(9);

    expect(queue.shift()).toBe(items[31]);
    expect(queue.getBackingLength()).toBe(8);
    expect(queue.size).toBe(8);
    expect(queue.shift()).toBe(items[32]);
  });

  it('resets the backing array when the last item is consumed', () => {
    const queue = new FifoQueue<Item>();
    const [only] = createItems(1);
    queue.push(only);
    queue.shift();

    expect(queue.getBackingLength()).toBe(0);
  });

  it('drains every remaining item and leaves the queue empty', () => {
    const queue = new FifoQueue<Item>();
    const items = createItems(4);
    for (const item of items) {
      queue.push(item);
    }
    queue.shift();

    expect(queue.drain()).toEqual([items[1], items[2], items[3]]);
    expect(queue.size).toBe(0);
    expect(queue.toArray()).toEqual([]);
  });
});
