import { getDefaultTimerHost, type ScheduledTimer, type TimerHost } from '../clock.js';

/**
 * Single-shot wake-ups keyed by name. At most one wake-up is pending per key;
 * scheduling an already pending key is a no-op.
 */
export class DelayedWakeups<TKey = string> {
  private readonly pending = new Map<TKey, ScheduledTimer>();

  constructor(private readonly timerHost: TimerHost = getDefaultTimerHost()) {}

  /** Returns false when a wake-up for `key` is already pending. */
  schedule(key: TKey, delayMs: number, callback: () => void): boolean {
    if (this.pending.has(key)) {
      return false;
    }
    const delay = Number.isFinite(delayMs) ? Math.max(0, delayMs) : 0;
    const timer = this.timerHost.schedule(() => {
      if (this.pending.get(key) !== timer) {
        return;
      }
      this.pending.delete(key);
      callback();
    }, delay);
    this.pending.set(key, timer);
    return true;
  }

  cancel(key: TKey): boolean {
    const timer = this.pending.get(key);
    if (!timer) {
      return false;
    }
    timer.cancel();
    this.pending.delete(key);
    return true;
  }

  isScheduled(key: TKey): boolean {
    return this.pending.has(key);
  }

  get size(): number {
    return this.pending.size;
  }

  cancelAll(): void {
    for (const timer of this.pending.values()) {
      timer.cancel();
    }
    this.pending.clear();
  }
}
