import { describe, expect, it } from 'vitest';
import { Registry } from 'prom-client';

import { createPrometheusTelemetry } from './telemetry-prometheus.js';

function createTestTelemetry() {
  const registry = new Registry();
  const telemetry = createPrometheusTelemetry({
    registry,
    collectDefaultMetrics: false,
    prefix: 'test_',
  });
  return { registry, telemetry };
}

async function readValues(registry: Registry, name: string) {
  const metric = await registry.getSingleMetric(name)?.get();
  return metric?.values.map(({ labels, value }) => ({ labels, value })) ?? [];
}

describe('createPrometheusTelemetry', () => {
  it('accumulates per-tick increments and keeps the latest gauge values', async () => {
    const { registry, telemetry } = createTestTelemetry();

    telemetry.recordCounters('scheduler', {
      pending: 12,
      processed: 10,
      priorityDecays: 0,
      processingBlocks: 1,
      invalidSkipped: 2,
    });
    telemetry.recordCounters('scheduler', {
      pending: 4,
      processed: 8,
      priorityDecays: 1,
      processingBlocks: 0,
      invalidSkipped: 0,
    });

    expect(await readValues(registry, 'test_updates_pending')).toEqual([
      { labels: {}, value: 4 },
    ]);
    expect(await readValues(registry, 'test_updates_processed_total')).toEqual([
      { labels: {}, value: 18 },
    ]);
    expect(await readValues(registry, 'test_priority_decays_total')).toEqual([
      { labels: {}, value: 1 },
    ]);
    expect(
      await readValues(registry, 'test_scheduler_reentrancy_blocks_total'),
    ).toEqual([{ labels: {}, value: 1 }]);
    expect(await readValues(registry, 'test_updates_invalid_skipped_total')).toEqual([
      { labels: {}, value: 2 },
    ]);
  });

  it('records budget and coalescer groups', async () => {
    const { registry, telemetry } = createTestTelemetry();

    telemetry.recordCounters('budget', {
      mean: 12.5,
      p95: 18,
      p99: 22,
      targetCycleTimeMs: 16.67,
      deferredPending: 3,
      droppedCallbacks: 2,
      callbackFailures: 0,
    });
    telemetry.recordCounters('coalescer', {
      savingsPercent: 75,
      coalesced: 40,
      dispatched: 10,
      budgetDefers: 5,
      emergencyFlushes: 1,
    });

    expect(await readValues(registry, 'test_cycle_mean_ms')).toEqual([
      { labels: {}, value: 12.5 },
    ]);
    expect(await readValues(registry, 'test_cycle_p99_ms')).toEqual([
      { labels: {}, value: 22 },
    ]);
    expect(await readValues(registry, 'test_deferred_callbacks_pending')).toEqual([
      { labels: {}, value: 3 },
    ]);
    expect(
      await readValues(registry, 'test_deferred_callbacks_dropped_total'),
    ).toEqual([{ labels: {}, value: 2 }]);
    expect(await readValues(registry, 'test_coalescer_savings_percent')).toEqual([
      { labels: {}, value: 75 },
    ]);
    expect(await readValues(registry, 'test_events_coalesced_total')).toEqual([
      { labels: {}, value: 40 },
    ]);
    expect(
      await readValues(registry, 'test_events_emergency_flushes_total'),
    ).toEqual([{ labels: {}, value: 1 }]);
  });

  it('ignores negative and non-finite values and unknown groups', async () => {
    const { registry, telemetry } = createTestTelemetry();

    telemetry.recordCounters('scheduler', {
      pending: Number.NaN,
      processed: -3,
    });
    telemetry.recordCounters('unrelated', { processed: 5 });

    expect(await readValues(registry, 'test_updates_pending')).toEqual([
      { labels: {}, value: 0 },
    ]);
    expect(await readValues(registry, 'test_updates_processed_total')).toEqual([
      { labels: {}, value: 0 },
    ]);
  });

  it('counts errors, warnings and slow handlers per event', async () => {
    const { registry, telemetry } = createTestTelemetry();

    telemetry.recordError('CoalescedSubscriberFailed', { component: 'EventCoalescer' });
    telemetry.recordWarning('EventHandlerSlow');
    telemetry.recordWarning('EventHandlerSlow');
    telemetry.recordWarning('EventEmergencyFlush');
    telemetry.recordTick();
    telemetry.recordTick();
    telemetry.recordProgress('GovernorPresetApplied');

    expect(await readValues(registry, 'test_telemetry_errors_total')).toEqual([
      { labels: { event: 'CoalescedSubscriberFailed' }, value: 1 },
    ]);
    expect(await readValues(registry, 'test_telemetry_warnings_total')).toEqual([
      { labels: { event: 'EventHandlerSlow' }, value: 2 },
      { labels: { event: 'EventEmergencyFlush' }, value: 1 },
    ]);
    expect(await readValues(registry, 'test_events_slow_handlers_total')).toEqual([
      { labels: {}, value: 2 },
    ]);
    expect(await readValues(registry, 'test_cycles_total')).toEqual([
      { labels: {}, value: 2 },
    ]);
  });

  it('exposes the registry it writes to', () => {
    const { registry, telemetry } = createTestTelemetry();
    expect(telemetry.registry).toBe(registry);
  });
});
