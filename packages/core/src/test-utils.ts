import { vi, type Mock } from 'vitest';

import type {
  HighResolutionClock,
  ScheduledTimer,
  TimerHost,
} from './clock.js';
import type { TelemetryFacade } from './telemetry.js';

export class StubClock implements HighResolutionClock {
  current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(byMs: number): void {
    this.current += byMs;
  }

  jump(toMs: number): void {
    this.current = toMs;
  }
}

interface ManualTimer {
  readonly dueAt: number;
  readonly order: number;
  readonly callback: () => void;
  cancelled: boolean;
}

/**
 * Timer host driven by a {@link StubClock}. Advancing it moves the clock to
 * each due timer in turn before firing it.
 */
export class ManualTimerHost implements TimerHost {
  private timers: ManualTimer[] = [];
  private nextOrder = 0;

  constructor(readonly clock: StubClock) {}

  schedule(callback: () => void, delayMs: number): ScheduledTimer {
    const timer: ManualTimer = {
      dueAt: this.clock.now() + Math.max(0, delayMs),
      order: this.nextOrder++,
      callback,
      cancelled: false,
    };
    this.timers.push(timer);
    return {
      cancel: () => {
        timer.cancelled = true;
      },
    };
  }

  get pendingCount(): number {
    return this.timers.filter((timer) => !timer.cancelled).length;
  }

  advance(byMs: number): void {
    const target = this.clock.now() + byMs;
    for (;;) {
      const next = this.nextDue(target);
      if (!next) {
        break;
      }
      this.timers = this.timers.filter((timer) => timer !== next);
      this.clock.jump(Math.max(this.clock.now(), next.dueAt));
      next.callback();
    }
    this.clock.jump(target);
  }

  private nextDue(limit: number): ManualTimer | undefined {
    let candidate: ManualTimer | undefined;
    for (const timer of this.timers) {
      if (timer.cancelled || timer.dueAt > limit) {
        continue;
      }
      if (
        candidate === undefined ||
        timer.dueAt < candidate.dueAt ||
        (timer.dueAt === candidate.dueAt && timer.order < candidate.order)
      ) {
        candidate = timer;
      }
    }
    return candidate;
  }
}

export interface RecordingTelemetry extends TelemetryFacade {
  readonly recordError: Mock<TelemetryFacade['recordError']>;
  readonly recordWarning: Mock<TelemetryFacade['recordWarning']>;
  readonly recordProgress: Mock<TelemetryFacade['recordProgress']>;
  readonly recordCounters: Mock<TelemetryFacade['recordCounters']>;
  readonly recordTick: Mock<TelemetryFacade['recordTick']>;
}

export function createRecordingTelemetry(): RecordingTelemetry {
  return {
    recordError: vi.fn<TelemetryFacade['recordError']>(),
    recordWarning: vi.fn<TelemetryFacade['recordWarning']>(),
    recordProgress: vi.fn<TelemetryFacade['recordProgress']>(),
    recordCounters: vi.fn<TelemetryFacade['recordCounters']>(),
    recordTick: vi.fn<TelemetryFacade['recordTick']>(),
  };
}
