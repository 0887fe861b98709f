import {
  getDefaultHighResolutionClock,
  type HighResolutionClock,
} from '../clock.js';
import {
  createSafeTelemetry,
  describeError,
  silentTelemetry,
  type TelemetryFacade,
} from '../telemetry.js';

/**
 * Maps event names to the argument tuple their handlers receive.
 *
 * @example
 * type UnitEvents = {
 *   'unit:health': [unitId: string, health: number];
 *   'roster:changed': [];
 * };
 */
export type EventArgsMap = Record<string, readonly unknown[]>;

export type EventName<TEvents extends EventArgsMap> = Extract<keyof TEvents, string>;

export type EventHandler<TArgs extends readonly unknown[]> = (...args: TArgs) => void;

/**
 * Delivery surface the coalescer forwards finalized events to. Implementations
 * must isolate handler failures.
 */
export interface DispatchSink<TEvents extends EventArgsMap> {
  dispatch<TName extends EventName<TEvents>>(
    eventName: TName,
    ...args: TEvents[TName]
  ): void;
}

export interface EventSubscription {
  unsubscribe(): void;
}

export interface EventSubscriptionOptions {
  readonly label?: string;
}

export interface SlowHandlerContext {
  readonly eventName: string;
  readonly durationMs: number;
  readonly thresholdMs: number;
  readonly handlerLabel?: string;
}

export interface EventBusOptions {
  readonly clock?: HighResolutionClock;
  readonly telemetry?: TelemetryFacade;
  /** Handlers running longer than this are reported. Zero disables timing. */
  readonly slowHandlerThresholdMs?: number;
  readonly onSlowHandler?: (context: SlowHandlerContext) => void;
}

export interface EventBusStatistics {
  readonly dispatched: number;
  readonly handlerInvocations: number;
  readonly handlerFailures: number;
  readonly slowHandlers: number;
  readonly subscribers: number;
}

interface SubscriberRecord<TEvents extends EventArgsMap> {
  readonly handler: EventHandler<TEvents[EventName<TEvents>]>;
  active: boolean;
  readonly label?: string;
}

const COMPONENT = 'EventBus';

/**
 * Observer registry with per-handler fault isolation. Handlers run
 * synchronously in registration order; a handler that throws is reported and
 * the remaining handlers still run.
 */
export class EventBus<TEvents extends EventArgsMap = EventArgsMap>
  implements DispatchSink<TEvents>
{
  private readonly subscribers = new Map<
    EventName<TEvents>,
    SubscriberRecord<TEvents>[]
  >();
  private readonly clock: HighResolutionClock;
  private readonly telemetry: TelemetryFacade;
  private readonly slowHandlerThresholdMs: number;
  private readonly onSlowHandler?: (context: SlowHandlerContext) => void;

  private dispatched = 0;
  private handlerInvocations = 0;
  private handlerFailures = 0;
  private slowHandlers = 0;

  constructor(options: EventBusOptions = {}) {
    this.clock = options.clock ?? getDefaultHighResolutionClock();
    this.telemetry = createSafeTelemetry(options.telemetry ?? silentTelemetry);
    this.slowHandlerThresholdMs =
      typeof options.slowHandlerThresholdMs === 'number' &&
      Number.isFinite(options.slowHandlerThresholdMs)
        ? Math.max(0, options.slowHandlerThresholdMs)
        : 0;
    this.onSlowHandler = options.onSlowHandler;
  }

  on<TName extends EventName<TEvents>>(
    eventName: TName,
    handler: EventHandler<TEvents[TName]>,
    options?: EventSubscriptionOptions,
  ): EventSubscription {
    const record: SubscriberRecord<TEvents> = {
      handler: handler as EventHandler<TEvents[EventName<TEvents>]>,
      active: true,
      label: options?.label,
    };
    const records = this.subscribers.get(eventName);
    if (records) {
      records.push(record);
    } else {
      this.subscribers.set(eventName, [record]);
    }

    return {
      unsubscribe: () => {
        if (!record.active) {
          return;
        }
        record.active = false;
        this.compactSubscribers(eventName);
      },
    };
  }

  /**
   * Removes the first active registration of `handler`. Returns whether one
   * was found.
   */
  off<TName extends EventName<TEvents>>(
    eventName: TName,
    handler: EventHandler<TEvents[TName]>,
  ): boolean {
    const records = this.subscribers.get(eventName);
    const record = records?.find(
      (candidate) => candidate.active && candidate.handler === handler,
    );
    if (!record) {
      return false;
    }
    record.active = false;
    this.compactSubscribers(eventName);
    return true;
  }

  /**
   * Invokes every active handler for `eventName` and returns how many ran.
   * Handlers added during the dispatch are not invoked until the next one.
   */
  dispatch<TName extends EventName<TEvents>>(
    eventName: TName,
    ...args: TEvents[TName]
  ): number {
    this.dispatched += 1;
    const records = this.subscribers.get(eventName);
    if (!records || records.length === 0) {
      return 0;
    }

    let invoked = 0;
    for (const record of [...records]) {
      if (!record.active) {
        continue;
      }
      invoked += 1;
      this.invoke(eventName, record, args);
    }
    this.handlerInvocations += invoked;
    return invoked;
  }

  getSubscriberCount(eventName?: EventName<TEvents>): number {
    if (eventName !== undefined) {
      return this.subscribers.get(eventName)?.length ?? 0;
    }
    let total = 0;
    for (const records of this.subscribers.values()) {
      total += records.length;
    }
    return total;
  }

  /** Drops every handler, or only those of `eventName`. */
  clear(eventName?: EventName<TEvents>): void {
    const names =
      eventName === undefined ? [...this.subscribers.keys()] : [eventName];
    for (const name of names) {
      for (const record of this.subscribers.get(name) ?? []) {
        record.active = false;
      }
      this.subscribers.delete(name);
    }
  }

  getStatistics(): EventBusStatistics {
    return {
      dispatched: this.dispatched,
      handlerInvocations: this.handlerInvocations,
      handlerFailures: this.handlerFailures,
      slowHandlers: this.slowHandlers,
      subscribers: this.getSubscriberCount(),
    };
  }

  private invoke(
    eventName: EventName<TEvents>,
    record: SubscriberRecord<TEvents>,
    args: TEvents[EventName<TEvents>],
  ): void {
    const start = this.slowHandlerThresholdMs > 0 ? this.clock.now() : 0;
    try {
      record.handler(...args);
    } catch (error) {
      this.handlerFailures += 1;
      this.telemetry.recordError('EventHandlerFailed', {
        component: COMPONENT,
        message: describeError(error),
        eventName,
        handler: record.label,
      });
    }

    if (this.slowHandlerThresholdMs <= 0) {
      return;
    }
    const durationMs = this.clock.now() - start;
    if (durationMs <= this.slowHandlerThresholdMs) {
      return;
    }
    this.slowHandlers += 1;
    const context: SlowHandlerContext = {
      eventName,
      durationMs,
      thresholdMs: this.slowHandlerThresholdMs,
      handlerLabel: record.label,
    };
    this.onSlowHandler?.(context);
    this.telemetry.recordWarning('EventHandlerSlow', {
      component: COMPONENT,
      message: `Handler for ${eventName} took ${durationMs}ms.`,
      eventName,
      durationMs,
      thresholdMs: this.slowHandlerThresholdMs,
      handler: record.label,
    });
  }

  private compactSubscribers(eventName: EventName<TEvents>): void {
    const records = this.subscribers.get(eventName);
    if (!records) {
      return;
    }

    let writeIndex = 0;
    for (const record of records) {
      if (!record.active) {
        continue;
      }
      records[writeIndex] = record;
      writeIndex += 1;
    }
    records.length = writeIndex;

    if (writeIndex === 0) {
      this.subscribers.delete(eventName);
    }
  }
}
