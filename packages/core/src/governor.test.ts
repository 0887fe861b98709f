import { describe, expect, it, vi } from 'vitest';

import { UpdatePriority } from './batch/update-priority.js';
import { BudgetPriority } from './budget/budget-tracker.js';
import { GovernorSettingsError } from './config-schema.js';
import { EventPriority } from './events/event-priority.js';
import { TickGovernor, type TickGovernorOptions } from './governor.js';
import {
  createRecordingTelemetry,
  ManualTimerHost,
  StubClock,
} from './test-utils.js';

type TestEvents = {
  score: [number];
  log: [string];
};

function createTarget() {
  return { update: vi.fn() };
}

function createGovernor(options: TickGovernorOptions = {}) {
  const clock = new StubClock(0);
  const timerHost = new ManualTimerHost(clock);
  const telemetry = createRecordingTelemetry();
  const governor = new TickGovernor<TestEvents>({
    clock,
    timerHost,
    telemetry,
    ...options,
  });
  return { governor, clock, timerHost, telemetry };
}

describe('TickGovernor', () => {
  describe('configuration', () => {
    it('layers overrides on top of the requested preset', () => {
      const { governor } = createGovernor({
        preset: ' HIGH ',
        overrides: { batch: { baseBatchSize: 5 } },
      });

      expect(governor.config.budget.targetCycleTimeMs).toBe(14);
      expect(governor.config.batch.baseBatchSize).toBe(5);
      expect(governor.config.coalescer.coalesceIntervalsMs).toEqual({
        critical: 0,
        high: 10,
        medium: 20,
        low: 30,
      });
      expect(governor.getSnapshot().preset).toBe('high');
      expect(governor.getBatchScheduler().getBatchSize()).toBe(5);
      expect(governor.getEventCoalescer().getCoalesceInterval(EventPriority.LOW)).toBe(30);
    });

    it('falls back to the medium preset and warns for an unknown name', () => {
      const { governor, telemetry } = createGovernor({ preset: 'turbo' });

      expect(governor.config.budget.targetCycleTimeMs).toBe(16.67);
      expect(governor.getSnapshot().preset).toBe('medium');
      expect(telemetry.recordWarning).toHaveBeenCalledWith(
        'GovernorPresetUnknown',
        expect.objectContaining({
          component: 'TickGovernor',
          requested: 'turbo',
          preset: 'medium',
        }),
      );
    });

    it('builds from a validated settings document', () => {
      const governor = TickGovernor.fromSettings({
        preset: 'low',
        enabled: false,
        overrides: { batch: { decayIntervalMs: 1000 } },
      });

      expect(governor.config.batch.baseBatchSize).toBe(2);
      expect(governor.config.batch.decayIntervalMs).toBe(1000);
      expect(governor.config.budget.targetCycleTimeMs).toBe(25);
      expect(governor.isEnabled()).toBe(false);
      governor.dispose();
    });

    it('rejects a malformed settings document', () => {
      expect(() => TickGovernor.fromSettings({ preset: 3 })).toThrow(
        GovernorSettingsError,
      );
    });
  });

  describe('tick', () => {
    it('drains deferred callbacks once cycles get cheaper', () => {
      const { governor } = createGovernor({
        overrides: { budget: { sampleCapacity: 1 } },
      });
      const seen: string[] = [];

      governor.tick(20);
      expect(
        governor.deferOrRun((label) => seen.push(label), BudgetPriority.MEDIUM, 'later'),
      ).toBe('deferred');
      expect(seen).toEqual([]);

      governor.tick(0);
      expect(seen).toEqual(['later']);
      expect(governor.getSnapshot().budget.deferredPending).toBe(0);
    });

    it('processes pending updates and reports the batch', () => {
      const { governor } = createGovernor();
      const target = createTarget();

      expect(governor.tick(5)).toBeUndefined();
      expect(governor.markPending(target, UpdatePriority.HIGH)).toBe(true);
      expect(governor.markPending(target, UpdatePriority.HIGH)).toBe(false);

      const result = governor.tick(5);

      expect(result).toEqual({ status: 'completed', processed: 1, batchSize: 16 });
      expect(target.update).toHaveBeenCalledTimes(1);
      expect(governor.tick(5)).toBeUndefined();
    });

    it('delivers registered events once per window and ad-hoc events through the bus', () => {
      const { governor, clock } = createGovernor();
      const scores: number[] = [];
      const logs: string[] = [];
      governor.registerCoalesced('score', 50, (value) => scores.push(value));
      governor.on('log', (line) => logs.push(line));

      governor.submit('score', undefined, 1);
      governor.submit('score', undefined, 2);
      governor.submit('score', undefined, 3);
      governor.submit('log', EventPriority.HIGH, 'a');
      governor.submit('log', EventPriority.LOW, 'b');

      clock.advance(60);
      governor.tick(5);

      expect(scores).toEqual([3]);
      expect(logs).toEqual(['a', 'b']);

      const { coalescer } = governor.getSnapshot();
      expect(coalescer.totalCoalesced).toBe(5);
      expect(coalescer.totalDispatched).toBe(3);
      expect(coalescer.perEvent.score).toEqual({ coalesced: 3, dispatched: 1, saved: 2 });
    });

    it('publishes cumulative statistics as per-tick increments', () => {
      const { governor, telemetry } = createGovernor();
      governor.markPending(createTarget());
      governor.markPending(createTarget());

      governor.tick(1);
      governor.tick(1);

      const schedulerCounters = telemetry.recordCounters.mock.calls
        .filter(([group]) => group === 'scheduler')
        .map(([, values]) => values);
      expect(schedulerCounters).toEqual([
        { pending: 0, processed: 2, priorityDecays: 0, processingBlocks: 0, invalidSkipped: 0 },
        { pending: 0, processed: 0, priorityDecays: 0, processingBlocks: 0, invalidSkipped: 0 },
      ]);
      expect(telemetry.recordTick).toHaveBeenCalledTimes(2);
      expect(governor.getSnapshot().cycles).toBe(2);
    });
  });

  it('forces pending updates and events through on a mode transition', () => {
    const { governor } = createGovernor();
    const target = createTarget();
    const scores: number[] = [];
    governor.registerCoalesced('score', 200, (value) => scores.push(value));

    governor.markPending(target, UpdatePriority.LOW);
    governor.submit('score', undefined, 9);
    governor.notifyModeTransition();

    expect(target.update).toHaveBeenCalledTimes(1);
    expect(scores).toEqual([9]);
  });

  it('forwards events straight to the bus while disabled', () => {
    const { governor } = createGovernor();
    const coalesced: number[] = [];
    const direct: number[] = [];
    governor.registerCoalesced('score', 50, (value) => coalesced.push(value));
    governor.on('score', (value) => direct.push(value));

    governor.setEnabled(false);
    governor.submit('score', undefined, 7);

    expect(direct).toEqual([7]);
    expect(coalesced).toEqual([]);
    expect(governor.markPending(createTarget())).toBe(false);
    expect(governor.isEnabled()).toBe(false);
    expect(governor.getSnapshot().coalescer.enabled).toBe(false);
  });

  it('applies presets at runtime', () => {
    const { governor, telemetry } = createGovernor();

    expect(governor.applyPreset('ultra')).toBe('ultra');
    expect(governor.getBudgetTracker().getTargetCycleTime()).toBe(10);
    expect(governor.getBatchScheduler().getBatchSize()).toBe(40);
    const coalescer = governor.getEventCoalescer();
    expect(coalescer.getCoalesceInterval(EventPriority.HIGH)).toBe(5);
    expect(coalescer.getCoalesceInterval(EventPriority.MEDIUM)).toBe(10);
    expect(coalescer.getCoalesceInterval(EventPriority.LOW)).toBe(15);
    expect(telemetry.recordProgress).toHaveBeenCalledWith(
      'GovernorPresetApplied',
      expect.objectContaining({ preset: 'ultra' }),
    );

    expect(governor.applyPreset('unknown')).toBe('medium');
    expect(telemetry.recordWarning).toHaveBeenCalledWith(
      'GovernorPresetUnknown',
      expect.objectContaining({ requested: 'unknown' }),
    );
  });

  it('cancels wake-ups and stops ticking once disposed', () => {
    const { governor, timerHost } = createGovernor();
    governor.registerCoalesced('score', 50, () => {});
    governor.submit('score', undefined, 1);
    expect(timerHost.pendingCount).toBe(1);

    governor.dispose();

    expect(timerHost.pendingCount).toBe(0);
    expect(governor.tick(5)).toBeUndefined();
    expect(governor.getSnapshot().cycles).toBe(0);
  });

  it('ignores new work once disposed', () => {
    const { governor, timerHost } = createGovernor();
    const scores: number[] = [];
    const ran: string[] = [];
    governor.registerCoalesced('score', 50, (value) => scores.push(value));
    governor.dispose();

    governor.submit('score', undefined, 4);
    expect(timerHost.pendingCount).toBe(0);
    expect(governor.getSnapshot().coalescer.totalCoalesced).toBe(0);

    expect(governor.markPending(createTarget())).toBe(false);
    expect(governor.getSnapshot().scheduler.pending).toBe(0);

    expect(
      governor.deferOrRun((label) => ran.push(label), BudgetPriority.CRITICAL, 'late'),
    ).toBe('dropped');
    expect(ran).toEqual([]);

    timerHost.advance(100);
    expect(scores).toEqual([]);
  });
});
