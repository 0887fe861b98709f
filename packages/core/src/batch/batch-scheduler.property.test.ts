import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { computeAdaptiveBatch, MIN_BATCH_SIZE } from './batch-scheduler.js';

const propertyConfig: fc.Parameters<unknown> = {
  seed: 4242,
  numRuns: 300,
  endOnFailure: true,
};

const loadMs = fc.double({ min: 0, max: 120, noNaN: true, noDefaultInfinity: true });

describe('computeAdaptiveBatch properties', () => {
  it('keeps the batch between the minimum and twice the base', () => {
    fc.assert(
      fc.property(fc.integer({ min: 2, max: 64 }), loadMs, loadMs, (base, mean, p95) => {
        const { batchSize, minIntervalMs } = computeAdaptiveBatch(base, { mean, p95 });
        expect(batchSize).toBeGreaterThanOrEqual(MIN_BATCH_SIZE);
        expect(batchSize).toBeLessThanOrEqual(base * 2);
        expect(Number.isInteger(batchSize)).toBe(true);
        expect([0, 18, 24, 30]).toContain(minIntervalMs);
      }),
      propertyConfig,
    );
  });

  it('never grows the batch when load increases', () => {
    fc.assert(
      fc.property(fc.integer({ min: 2, max: 8 }), loadMs, loadMs, (base, a, b) => {
        const lighter = Math.min(a, b);
        const heavier = Math.max(a, b);
        const relaxed = computeAdaptiveBatch(base, { mean: lighter, p95: lighter });
        const loaded = computeAdaptiveBatch(base, { mean: heavier, p95: heavier });
        expect(loaded.batchSize).toBeLessThanOrEqual(relaxed.batchSize);
      }),
      propertyConfig,
    );
  });
});
