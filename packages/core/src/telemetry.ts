/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

/**
 * Diagnostic sink shared by every governor subsystem. Errors and warnings
 * carry the reporting `component` and a human readable `message` in their
 * data; the method used is the severity.
 */
export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
  recordTick(): void;
}

const consoleTelemetry: TelemetryFacade = {
  recordError(event, data) {
    console.error(`[telemetry:error] ${event}`, data);
  },
  recordWarning(event, data) {
    console.warn(`[telemetry:warning] ${event}`, data);
  },
  recordProgress(event, data) {
    console.info(`[telemetry:progress] ${event}`, data);
  },
  recordCounters(group, counters) {
    console.info(`[telemetry:counters] ${group}`, counters);
  },
  recordTick() {
    console.debug('[telemetry:tick]');
  },
};

/**
 * A no-op telemetry implementation that silently discards all events.
 * This is the default facade for every subsystem.
 */
export const silentTelemetry: TelemetryFacade = Object.freeze({
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
  recordTick() {},
});

/**
 * Creates a telemetry facade that logs all events to the console.
 * Use this for development/debugging when you want to see telemetry output.
 *
 * @example
 * const governor = new TickGovernor({ telemetry: createConsoleTelemetry() });
 */
export function createConsoleTelemetry(): TelemetryFacade {
  return consoleTelemetry;
}

/**
 * Wraps a facade so a failing sink never propagates into the caller. Every
 * subsystem routes its reports through one of these.
 */
export function createSafeTelemetry(facade: TelemetryFacade): TelemetryFacade {
  if (facade === silentTelemetry) {
    return facade;
  }
  return {
    recordError(event, data) {
      invokeSafely(facade, 'recordError', event, data);
    },
    recordWarning(event, data) {
      invokeSafely(facade, 'recordWarning', event, data);
    },
    recordProgress(event, data) {
      invokeSafely(facade, 'recordProgress', event, data);
    },
    recordCounters(group, counters) {
      invokeSafely(facade, 'recordCounters', group, counters);
    },
    recordTick() {
      invokeSafely(facade, 'recordTick');
    },
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function invokeSafely<TMethod extends keyof TelemetryFacade>(
  facade: TelemetryFacade,
  method: TMethod,
  ...args: Parameters<TelemetryFacade[TMethod]>
): void {
  try {
    (
      facade[method] as (
        ...fnArgs: Parameters<TelemetryFacade[TMethod]>
      ) => ReturnType<TelemetryFacade[TMethod]>
    ).call(facade, ...args);
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}
