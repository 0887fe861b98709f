import { describe, expect, it } from 'vitest';

import * as core from './index.js';

describe('package entry point', () => {
  it('exposes the governor and its subsystems', () => {
    expect(typeof core.TickGovernor).toBe('function');
    expect(typeof core.BudgetTracker).toBe('function');
    expect(typeof core.BatchScheduler).toBe('function');
    expect(typeof core.EventCoalescer).toBe('function');
    expect(typeof core.EventBus).toBe('function');
    expect(typeof core.analyzePerformance).toBe('function');
  });

  it('keeps prom-client out of the main entry', () => {
    expect('createPrometheusTelemetry' in core).toBe(false);
  });

  it('wires a governor end to end with the public API', () => {
    const governor = new core.TickGovernor({ preset: 'low' });
    const target = { update: () => {} };

    expect(governor.markPending(target, core.UpdatePriority.CRITICAL)).toBe(true);
    governor.tick(4);

    const snapshot = governor.getSnapshot();
    expect(snapshot.scheduler.processed).toBe(1);
    expect(core.analyzePerformance(snapshot, 'scheduler').findings).toEqual([
      'Scheduler: processed=1 batches=1 pending=0 invalid=0 blocks=0 decays=0',
    ]);
    governor.dispose();
  });
});
