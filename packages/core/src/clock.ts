export interface HighResolutionClock {
  now(): number;
}

export interface ScheduledTimer {
  cancel(): void;
}

/**
 * Single-shot timer source used for delayed wake-ups. The default host wraps
 * `setTimeout`; tests substitute a manually advanced implementation.
 */
export interface TimerHost {
  schedule(callback: () => void, delayMs: number): ScheduledTimer;
}

const sharedPerformance = (globalThis as {
  performance?: { now(): number };
}).performance;

export function getDefaultHighResolutionClock(): HighResolutionClock {
  if (
    sharedPerformance &&
    typeof sharedPerformance.now === 'function'
  ) {
    return {
      now: () => sharedPerformance.now(),
    };
  }

  const maybeProcess = (globalThis as {
    process?: {
      hrtime?: {
        bigint?: () => bigint;
      };
    };
  }).process;

  const bigintHrTime = maybeProcess?.hrtime?.bigint;

  if (typeof bigintHrTime === 'function') {
    const origin = bigintHrTime.call(maybeProcess?.hrtime);
    return {
      now: () => {
        const delta = bigintHrTime.call(maybeProcess?.hrtime) - origin;
        return Number(delta) / 1_000_000;
      },
    };
  }

  return {
    now: () => Date.now(),
  };
}

export function getDefaultTimerHost(): TimerHost {
  return {
    schedule(callback, delayMs) {
      const handle = setTimeout(callback, Math.max(0, delayMs));
      // Pending wake-ups must never keep a Node.js host alive on their own.
      handle.unref();
      return {
        cancel() {
          clearTimeout(handle);
        },
      };
    },
  };
}
