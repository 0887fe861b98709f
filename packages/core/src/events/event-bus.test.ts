import { describe, expect, it, vi } from 'vitest';

import { createRecordingTelemetry, StubClock } from '../test-utils.js';
import { EventBus } from './event-bus.js';

type TestEvents = {
  'unit:health': [unitId: string, health: number];
  'roster:changed': [];
};

describe('EventBus', () => {
  it('delivers arguments to handlers in registration order', () => {
    const bus = new EventBus<TestEvents>();
    const seen: string[] = [];
    bus.on('unit:health', (unitId, health) => seen.push(`first:${unitId}:${health}`));
    bus.on('unit:health', (unitId) => seen.push(`second:${unitId}`));

    expect(bus.dispatch('unit:health', 'u1', 40)).toBe(2);
    expect(seen).toEqual(['first:u1:40', 'second:u1']);
  });

  it('keeps invoking handlers after one throws', () => {
    const telemetry = createRecordingTelemetry();
    const bus = new EventBus<TestEvents>({ telemetry });
    const after = vi.fn();
    bus.on(
      'roster:changed',
      () => {
        throw new Error('handler exploded');
      },
      { label: 'faulty' },
    );
    bus.on('roster:changed', after);

    bus.dispatch('roster:changed');

    expect(after).toHaveBeenCalledTimes(1);
    expect(bus.getStatistics().handlerFailures).toBe(1);
    expect(telemetry.recordError).toHaveBeenCalledWith('EventHandlerFailed', {
      component: 'EventBus',
      message: 'handler exploded',
      eventName: 'roster:changed',
      handler: 'faulty',
    });
  });

  it('stops delivering after unsubscribe or off', () => {
    const bus = new EventBus<TestEvents>();
    const first = vi.fn();
    const second = vi.fn();
    const subscription = bus.on('roster:changed', first);
    bus.on('roster:changed', second);

    subscription.unsubscribe();
    expect(bus.off('roster:changed', second)).toBe(true);
    expect(bus.off('roster:changed', second)).toBe(false);

    expect(bus.dispatch('roster:changed')).toBe(0);
    expect(first).not.toHaveBeenCalled();
    expect(bus.getSubscriberCount('roster:changed')).toBe(0);
  });

  it('skips handlers removed by an earlier handler in the same dispatch', () => {
    const bus = new EventBus<TestEvents>();
    const later = vi.fn();
    bus.on('roster:changed', () => {
      subscription.unsubscribe();
    });
    const subscription = bus.on('roster:changed', later);

    expect(bus.dispatch('roster:changed')).toBe(1);
    expect(later).not.toHaveBeenCalled();
  });

  it('reports handlers slower than the threshold', () => {
    const clock = new StubClock();
    const telemetry = createRecordingTelemetry();
    const onSlowHandler = vi.fn();
    const bus = new EventBus<TestEvents>({
      clock,
      telemetry,
      slowHandlerThresholdMs: 5,
      onSlowHandler,
    });
    bus.on('roster:changed', () => clock.advance(8), { label: 'layout' });
    bus.on('roster:changed', () => clock.advance(2));

    bus.dispatch('roster:changed');

    expect(onSlowHandler).toHaveBeenCalledTimes(1);
    expect(onSlowHandler).toHaveBeenCalledWith({
      eventName: 'roster:changed',
      durationMs: 8,
      thresholdMs: 5,
      handlerLabel: 'layout',
    });
    expect(telemetry.recordWarning).toHaveBeenCalledWith(
      'EventHandlerSlow',
      expect.objectContaining({ component: 'EventBus', durationMs: 8 }),
    );
    expect(bus.getStatistics().slowHandlers).toBe(1);
  });

  it('counts subscribers across events and clears them', () => {
    const bus = new EventBus<TestEvents>();
    bus.on('roster:changed', () => {});
    bus.on('unit:health', () => {});
    bus.on('unit:health', () => {});

    expect(bus.getSubscriberCount()).toBe(3);
    bus.clear('unit:health');
    expect(bus.getSubscriberCount()).toBe(1);
    bus.clear();
    expect(bus.getSubscriberCount()).toBe(0);
  });
});
