import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { BudgetTracker, computePercentiles } from './budget-tracker.js';

const PROPERTY_SEED = 1671;
const PROPERTY_RUNS = 200;

const propertyConfig = (offset: number): fc.Parameters<unknown> => ({
  seed: PROPERTY_SEED + offset,
  numRuns: PROPERTY_RUNS,
  endOnFailure: true,
});

const cycleSample = fc.double({
  min: 0,
  max: 250,
  noNaN: true,
  noDefaultInfinity: true,
});

describe('BudgetTracker properties', () => {
  it('keeps P50 <= P95 <= P99 after every recomputation', () => {
    fc.assert(
      fc.property(
        fc.array(cycleSample, { minLength: 1, maxLength: 400 }),
        (samples) => {
          const tracker = new BudgetTracker();
          for (const sample of samples) {
            tracker.recordCycle(sample);
            const stats = tracker.getStatistics();
            expect(stats.p50).toBeLessThanOrEqual(stats.p95);
            expect(stats.p95).toBeLessThanOrEqual(stats.p99);
          }
        },
      ),
      propertyConfig(0),
    );
  });

  it('selects percentiles from the sample set itself', () => {
    fc.assert(
      fc.property(
        fc.array(cycleSample, { minLength: 1, maxLength: 200 }),
        (samples) => {
          const { p50, p95, p99 } = computePercentiles(samples);
          expect(samples).toContain(p50);
          expect(samples).toContain(p95);
          expect(samples).toContain(p99);
        },
      ),
      propertyConfig(1),
    );
  });

  it('keeps the running mean within the bounds of the retained window', () => {
    fc.assert(
      fc.property(
        fc.array(cycleSample, { minLength: 1, maxLength: 300 }),
        fc.integer({ min: 1, max: 50 }),
        (samples, capacity) => {
          const tracker = new BudgetTracker({ sampleCapacity: capacity });
          for (const sample of samples) {
            tracker.recordCycle(sample);
          }
          const window = samples.slice(-capacity);
          const stats = tracker.getStatistics();
          const tolerance = 1e-6;
          expect(stats.sampleCount).toBe(window.length);
          expect(stats.mean).toBeGreaterThanOrEqual(Math.min(...window) - tolerance);
          expect(stats.mean).toBeLessThanOrEqual(Math.max(...window) + tolerance);
        },
      ),
      propertyConfig(2),
    );
  });
});
