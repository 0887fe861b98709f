import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { BudgetTracker } from '../budget/budget-tracker.js';
import { ManualTimerHost, StubClock } from '../test-utils.js';
import { EventBus } from './event-bus.js';
import { EventCoalescer } from './event-coalescer.js';
import { EventPriority } from './event-priority.js';

type PropertyEvents = {
  alpha: [value: number];
  beta: [value: number];
  gamma: [value: number];
  delta: [value: number];
};

type Operation =
  | { readonly kind: 'submit'; readonly name: keyof PropertyEvents; readonly priority: EventPriority; readonly value: number }
  | { readonly kind: 'advance'; readonly ms: number }
  | { readonly kind: 'tick' }
  | { readonly kind: 'flush' }
  | { readonly kind: 'load'; readonly cycleMs: number };

const propertyConfig: fc.Parameters<unknown> = {
  seed: 90210,
  numRuns: 150,
  endOnFailure: true,
};

const priorityArb = fc.constantFrom(
  EventPriority.CRITICAL,
  EventPriority.HIGH,
  EventPriority.MEDIUM,
  EventPriority.LOW,
);

const operationArb: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({
    kind: fc.constant('submit' as const),
    name: fc.constantFrom<keyof PropertyEvents>('alpha', 'beta', 'gamma', 'delta'),
    priority: priorityArb,
    value: fc.integer({ min: 0, max: 1000 }),
  }),
  fc.record({ kind: fc.constant('advance' as const), ms: fc.integer({ min: 0, max: 120 }) }),
  fc.record({ kind: fc.constant('tick' as const) }),
  fc.record({ kind: fc.constant('flush' as const) }),
  fc.record({ kind: fc.constant('load' as const), cycleMs: fc.integer({ min: 0, max: 40 }) }),
);

describe('EventCoalescer savings accounting', () => {
  it('keeps saved equal to coalesced minus dispatched within [0, 100] percent', () => {
    fc.assert(
      fc.property(fc.array(operationArb, { maxLength: 80 }), (operations) => {
        const clock = new StubClock();
        const host = new ManualTimerHost(clock);
        const budget = new BudgetTracker({ sampleCapacity: 1 });
        const coalescer = new EventCoalescer<PropertyEvents>({
          sink: new EventBus<PropertyEvents>(),
          budget,
          clock,
          timerHost: host,
        });
        coalescer.registerCoalesced('alpha', 30, () => {}, EventPriority.HIGH);
        coalescer.registerCoalesced('beta', 0, () => {}, EventPriority.LOW);

        for (const operation of operations) {
          switch (operation.kind) {
            case 'submit':
              coalescer.submit(operation.name, operation.priority, operation.value);
              break;
            case 'advance':
              host.advance(operation.ms);
              break;
            case 'tick':
              coalescer.tick();
              break;
            case 'flush':
              coalescer.flush();
              break;
            case 'load':
              budget.recordCycle(operation.cycleMs);
              break;
          }

          const stats = coalescer.getStatistics();
          expect(stats.saved).toBe(stats.totalCoalesced - stats.totalDispatched);
          expect(stats.totalDispatched).toBeLessThanOrEqual(stats.totalCoalesced);
          expect(stats.savingsPercent).toBeGreaterThanOrEqual(0);
          expect(stats.savingsPercent).toBeLessThanOrEqual(100);
          for (const counters of Object.values(stats.perEvent)) {
            expect(counters.saved).toBe(counters.coalesced - counters.dispatched);
            expect(counters.saved).toBeGreaterThanOrEqual(0);
          }
        }

        coalescer.flush();
        const drained = coalescer.getStatistics();
        expect(drained.pendingRegistered).toBe(0);
        expect(drained.queuedEvents).toBe(0);
      }),
      propertyConfig,
    );
  });
});
