import type { BudgetGate } from '../budget/budget-tracker.js';
import {
  getDefaultHighResolutionClock,
  getDefaultTimerHost,
  type HighResolutionClock,
  type TimerHost,
} from '../clock.js';
import { eventPriorityToBudgetPriority } from '../priority-mapping.js';
import {
  createSafeTelemetry,
  describeError,
  silentTelemetry,
  type TelemetryFacade,
} from '../telemetry.js';
import { DelayedWakeups } from './delayed-wakeups.js';
import type {
  DispatchSink,
  EventArgsMap,
  EventHandler,
  EventName,
} from './event-bus.js';
import {
  clampEventPriority,
  DEFAULT_EVENT_PRIORITY,
  EventPriority,
} from './event-priority.js';

export const DEFAULT_EVENT_DELAY_MS = 50;
export const MAX_EVENT_DELAY_MS = 500;
export const MIN_ADJUSTED_EVENT_DELAY_MS = 10;
const DISPATCH_COST_MS = 0.5;
const COMPONENT = 'EventCoalescer';

/** Budget refusals tolerated before a registered event is force-dispatched. */
export const MAX_BUDGET_DEFERS: Readonly<Record<EventPriority, number>> =
  Object.freeze({
    [EventPriority.CRITICAL]: 0,
    [EventPriority.HIGH]: 5,
    [EventPriority.MEDIUM]: 7,
    [EventPriority.LOW]: 9,
  });

/** Longest a registered event may wait after its first submit. */
export const MAX_DEFER_WINDOW_MS: Readonly<Record<EventPriority, number>> =
  Object.freeze({
    [EventPriority.CRITICAL]: 0,
    [EventPriority.HIGH]: 350,
    [EventPriority.MEDIUM]: 450,
    [EventPriority.LOW]: 550,
  });

export const DEFAULT_COALESCE_INTERVALS_MS: Readonly<Record<EventPriority, number>> =
  Object.freeze({
    [EventPriority.CRITICAL]: 0,
    [EventPriority.HIGH]: 10,
    [EventPriority.MEDIUM]: 30,
    [EventPriority.LOW]: 50,
  });

export interface CoalescedEventCounters {
  readonly coalesced: number;
  readonly dispatched: number;
  /** `coalesced - dispatched`. */
  readonly saved: number;
}

export interface DispatchBatchStatistics {
  readonly min: number;
  readonly max: number;
  readonly avg: number;
  readonly count: number;
}

export interface EventCoalescerStatistics {
  readonly totalCoalesced: number;
  readonly totalDispatched: number;
  readonly saved: number;
  /** `saved / totalCoalesced * 100`, clamped to [0, 100]. */
  readonly savingsPercent: number;
  readonly budgetDefers: number;
  readonly emergencyFlushes: number;
  readonly immediateCritical: number;
  readonly subscriberFailures: number;
  /** Ad-hoc buckets waiting for their interval. */
  readonly queuedEvents: number;
  /** Registered events holding undelivered arguments. */
  readonly pendingRegistered: number;
  readonly perEvent: Readonly<Record<string, CoalescedEventCounters>>;
  readonly batchSizes: Readonly<Record<string, DispatchBatchStatistics>>;
  readonly enabled: boolean;
}

export interface EventCoalescerOptions<TEvents extends EventArgsMap> {
  /** Receives ad-hoc, disabled-mode and `dispatchNow` deliveries. */
  readonly sink: DispatchSink<TEvents>;
  /** Consulted before each registered dispatch. Absent means always affordable. */
  readonly budget?: BudgetGate;
  readonly enabled?: boolean;
  readonly coalesceIntervalsMs?: Partial<Record<EventPriority, number>>;
  readonly clock?: HighResolutionClock;
  readonly timerHost?: TimerHost;
  readonly telemetry?: TelemetryFacade;
}

interface CoalescedSlot<TEvents extends EventArgsMap> {
  readonly subscribers: EventHandler<TEvents[EventName<TEvents>]>[];
  delayMs: number;
  priority: EventPriority;
  pendingArgs: TEvents[EventName<TEvents>] | undefined;
  accumulatedCount: number;
  firstQueuedAt: number;
  deferCount: number;
  timerScheduled: boolean;
}

interface QueuedEventBucket<TEvents extends EventArgsMap> {
  priority: EventPriority;
  readonly argList: TEvents[EventName<TEvents>][];
}

interface MutableCounters {
  coalesced: number;
  dispatched: number;
}

interface MutableBatchSizes {
  min: number;
  max: number;
  total: number;
  count: number;
}

/**
 * Collapses bursts of named events.
 *
 * Registered events (see {@link EventCoalescer.registerCoalesced}) keep only
 * their latest arguments and are delivered once per delay window to their
 * own subscribers, yielding to the cycle budget until a per-priority defer
 * count or wait window forces an emergency flush. Unregistered events are
 * collected per name and handed to the sink wholesale once their priority's
 * interval has passed.
 */
export class EventCoalescer<TEvents extends EventArgsMap = EventArgsMap> {
  private readonly slots = new Map<EventName<TEvents>, CoalescedSlot<TEvents>>();
  private readonly buckets = new Map<EventName<TEvents>, QueuedEventBucket<TEvents>>();
  private readonly lastBucketFlushAt = new Map<EventName<TEvents>, number>();
  private readonly intervalsMs: Record<EventPriority, number> = {
    ...DEFAULT_COALESCE_INTERVALS_MS,
  };
  private readonly sink: DispatchSink<TEvents>;
  private readonly budget: BudgetGate | undefined;
  private readonly clock: HighResolutionClock;
  private readonly wakeups: DelayedWakeups<EventName<TEvents>>;
  private readonly telemetry: TelemetryFacade;
  private enabled: boolean;

  private perEvent = new Map<string, MutableCounters>();
  private batchSizes = new Map<string, MutableBatchSizes>();
  private totalCoalesced = 0;
  private totalDispatched = 0;
  private budgetDefers = 0;
  private emergencyFlushes = 0;
  private immediateCritical = 0;
  private subscriberFailures = 0;

  constructor(options: EventCoalescerOptions<TEvents>) {
    this.sink = options.sink;
    this.budget = options.budget;
    this.enabled = options.enabled ?? true;
    this.clock = options.clock ?? getDefaultHighResolutionClock();
    this.wakeups = new DelayedWakeups<EventName<TEvents>>(
      options.timerHost ?? getDefaultTimerHost(),
    );
    this.telemetry = createSafeTelemetry(options.telemetry ?? silentTelemetry);
    for (const [priority, intervalMs] of Object.entries(
      options.coalesceIntervalsMs ?? {},
    )) {
      this.setCoalesceInterval(Number(priority), intervalMs);
    }
  }

  /**
   * Subscribes `subscriber` to coalesced deliveries of `eventName` and sets
   * the event's delay (clamped to 0..500 ms, default 50) and priority.
   * Registering the same subscriber twice is a no-op. Returns false for an
   * empty name or a non-function subscriber.
   */
  registerCoalesced<TName extends EventName<TEvents>>(
    eventName: TName,
    delayMs: number | undefined,
    subscriber: EventHandler<TEvents[TName]>,
    priority: EventPriority = DEFAULT_EVENT_PRIORITY,
  ): boolean {
    if (eventName.length === 0 || typeof subscriber !== 'function') {
      return false;
    }

    let slot = this.slots.get(eventName);
    if (!slot) {
      slot = {
        subscribers: [],
        delayMs: DEFAULT_EVENT_DELAY_MS,
        priority: DEFAULT_EVENT_PRIORITY,
        pendingArgs: undefined,
        accumulatedCount: 0,
        firstQueuedAt: 0,
        deferCount: 0,
        timerScheduled: false,
      };
      this.slots.set(eventName, slot);
    }
    slot.delayMs = clampDelay(delayMs, 0);
    slot.priority = clampEventPriority(priority);

    // Subscribers are stored under the widened argument type of the map.
    const stored = subscriber as EventHandler<TEvents[EventName<TEvents>]>;
    if (!slot.subscribers.includes(stored)) {
      slot.subscribers.push(stored);
    }
    this.ensureEventStats(eventName);
    return true;
  }

  unregister<TName extends EventName<TEvents>>(
    eventName: TName,
    subscriber: EventHandler<TEvents[TName]>,
  ): boolean {
    const slot = this.slots.get(eventName);
    if (!slot) {
      return false;
    }
    const index = slot.subscribers.lastIndexOf(
      subscriber as EventHandler<TEvents[EventName<TEvents>]>,
    );
    if (index === -1) {
      return false;
    }
    slot.subscribers.splice(index, 1);
    return true;
  }

  /**
   * Submits one occurrence of `eventName`. `priority` only applies to
   * unregistered events; registered events use their registered priority.
   */
  submit<TName extends EventName<TEvents>>(
    eventName: TName,
    priority: EventPriority | undefined,
    ...args: TEvents[TName]
  ): void {
    if (!this.enabled) {
      this.sink.dispatch(eventName, ...args);
      return;
    }

    const slot = this.slots.get(eventName);
    if (slot) {
      this.accumulate(eventName, slot, args);
      return;
    }

    this.enqueueAdHoc(eventName, clampEventPriority(priority), args);
  }

  /**
   * Flushes ad-hoc buckets whose interval has elapsed and retries registered
   * events whose delay window has closed, including ones the budget
   * postponed earlier.
   */
  tick(): void {
    const now = this.clock.now();

    for (const [eventName, bucket] of [...this.buckets]) {
      const lastFlush = this.lastBucketFlushAt.get(eventName);
      if (
        lastFlush === undefined ||
        now - lastFlush >= this.intervalsMs[bucket.priority]
      ) {
        this.flushBucket(eventName, bucket, now);
      }
    }

    for (const [eventName, slot] of [...this.slots]) {
      if (slot.accumulatedCount > 0 && now - slot.firstQueuedAt >= slot.delayMs) {
        this.dispatchRegistered(eventName, slot, false);
      }
    }
  }

  /** Delivers everything pending now, ignoring delays, intervals and the budget. */
  flush(): void {
    const now = this.clock.now();
    for (const [eventName, bucket] of [...this.buckets]) {
      this.flushBucket(eventName, bucket, now);
    }
    for (const [eventName, slot] of [...this.slots]) {
      this.dispatchRegistered(eventName, slot, true);
    }
  }

  /** Hands an event straight to the sink without coalescing or counting it. */
  dispatchNow<TName extends EventName<TEvents>>(
    eventName: TName,
    ...args: TEvents[TName]
  ): void {
    this.sink.dispatch(eventName, ...args);
  }

  /** Adjusts a registered event's delay, clamped to 10..500 ms. */
  setEventDelay(eventName: EventName<TEvents>, delayMs: number): boolean {
    const slot = this.slots.get(eventName);
    if (!slot) {
      return false;
    }
    slot.delayMs = clampDelay(delayMs, MIN_ADJUSTED_EVENT_DELAY_MS);
    return true;
  }

  getEventDelay(eventName: EventName<TEvents>): number {
    return this.slots.get(eventName)?.delayMs ?? DEFAULT_EVENT_DELAY_MS;
  }

  getCoalescedEvents(): EventName<TEvents>[] {
    return [...this.slots.keys()];
  }

  /** Sets the ad-hoc flush interval for a priority. Unknown priorities are ignored. */
  setCoalesceInterval(priority: number, intervalMs: number | undefined): boolean {
    if (!isEventPriority(priority)) {
      return false;
    }
    if (typeof intervalMs === 'number' && Number.isFinite(intervalMs)) {
      this.intervalsMs[priority] = Math.max(0, intervalMs);
    }
    return true;
  }

  getCoalesceInterval(priority: EventPriority): number {
    return this.intervalsMs[clampEventPriority(priority)];
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  resetStatistics(): void {
    this.perEvent = new Map();
    this.batchSizes = new Map();
    this.totalCoalesced = 0;
    this.totalDispatched = 0;
    this.budgetDefers = 0;
    this.emergencyFlushes = 0;
    this.immediateCritical = 0;
    this.subscriberFailures = 0;
  }

  getStatistics(): EventCoalescerStatistics {
    const perEvent: Record<string, CoalescedEventCounters> = {};
    for (const [eventName, counters] of this.perEvent) {
      perEvent[eventName] = Object.freeze({
        coalesced: counters.coalesced,
        dispatched: counters.dispatched,
        saved: counters.coalesced - counters.dispatched,
      });
    }

    const batchSizes: Record<string, DispatchBatchStatistics> = {};
    for (const [eventName, sizes] of this.batchSizes) {
      batchSizes[eventName] = Object.freeze({
        min: sizes.count === 0 ? 0 : sizes.min,
        max: sizes.max,
        avg: sizes.count === 0 ? 0 : sizes.total / sizes.count,
        count: sizes.count,
      });
    }

    let pendingRegistered = 0;
    for (const slot of this.slots.values()) {
      if (slot.accumulatedCount > 0) {
        pendingRegistered += 1;
      }
    }

    const saved = this.totalCoalesced - this.totalDispatched;
    return Object.freeze({
      totalCoalesced: this.totalCoalesced,
      totalDispatched: this.totalDispatched,
      saved,
      savingsPercent: computeSavingsPercent(this.totalCoalesced, this.totalDispatched),
      budgetDefers: this.budgetDefers,
      emergencyFlushes: this.emergencyFlushes,
      immediateCritical: this.immediateCritical,
      subscriberFailures: this.subscriberFailures,
      queuedEvents: this.buckets.size,
      pendingRegistered,
      perEvent: Object.freeze(perEvent),
      batchSizes: Object.freeze(batchSizes),
      enabled: this.enabled,
    });
  }

  /** Cancels every pending wake-up. Queued events stay until flushed. */
  dispose(): void {
    this.wakeups.cancelAll();
    for (const slot of this.slots.values()) {
      slot.timerScheduled = false;
    }
  }

  private accumulate(
    eventName: EventName<TEvents>,
    slot: CoalescedSlot<TEvents>,
    args: TEvents[EventName<TEvents>],
  ): void {
    const now = this.clock.now();
    slot.pendingArgs = args;
    slot.accumulatedCount += 1;
    if (slot.accumulatedCount === 1) {
      slot.firstQueuedAt = now;
      slot.deferCount = 0;
    }
    this.countCoalesced(eventName);

    if (slot.priority === EventPriority.CRITICAL) {
      this.immediateCritical += 1;
      this.dispatchRegistered(eventName, slot, false);
      return;
    }

    // The window opens at the first submit after a dispatch, which is never
    // earlier than that dispatch.
    const elapsed = now - slot.firstQueuedAt;
    if (elapsed >= slot.delayMs) {
      this.dispatchRegistered(eventName, slot, false);
      return;
    }

    if (!slot.timerScheduled) {
      slot.timerScheduled = true;
      this.wakeups.schedule(eventName, slot.delayMs - elapsed, () => {
        slot.timerScheduled = false;
        this.dispatchRegistered(eventName, slot, false);
      });
    }
  }

  private dispatchRegistered(
    eventName: EventName<TEvents>,
    slot: CoalescedSlot<TEvents>,
    force: boolean,
  ): boolean {
    if (slot.accumulatedCount <= 0) {
      return false;
    }

    const now = this.clock.now();
    if (
      !force &&
      this.budget &&
      !this.budget.canAfford(
        eventPriorityToBudgetPriority(slot.priority),
        DISPATCH_COST_MS,
      )
    ) {
      slot.deferCount += 1;
      this.budgetDefers += 1;

      const waitedMs = now - slot.firstQueuedAt;
      const critical = slot.priority === EventPriority.CRITICAL;
      if (
        !critical &&
        slot.deferCount < MAX_BUDGET_DEFERS[slot.priority] &&
        waitedMs < MAX_DEFER_WINDOW_MS[slot.priority]
      ) {
        return false;
      }
      if (!critical) {
        this.emergencyFlushes += 1;
        this.telemetry.recordWarning('EventEmergencyFlush', {
          component: COMPONENT,
          message: `Forced dispatch of ${eventName} after ${slot.deferCount} budget defers.`,
          eventName,
          priority: slot.priority,
          deferCount: slot.deferCount,
          waitedMs,
        });
      }
    }

    const args = slot.pendingArgs;
    const accumulated = slot.accumulatedCount;
    slot.pendingArgs = undefined;
    slot.accumulatedCount = 0;
    slot.firstQueuedAt = 0;
    slot.deferCount = 0;
    slot.timerScheduled = false;
    this.wakeups.cancel(eventName);

    if (args !== undefined) {
      for (const subscriber of [...slot.subscribers]) {
        try {
          subscriber(...args);
        } catch (error) {
          this.subscriberFailures += 1;
          this.telemetry.recordError('CoalescedSubscriberFailed', {
            component: COMPONENT,
            message: describeError(error),
            eventName,
          });
        }
      }
    }

    this.totalDispatched += 1;
    this.getCounters(eventName).dispatched += 1;
    this.recordBatch(eventName, accumulated);
    return true;
  }

  private enqueueAdHoc(
    eventName: EventName<TEvents>,
    priority: EventPriority,
    args: TEvents[EventName<TEvents>],
  ): void {
    this.ensureEventStats(eventName);

    if (priority === EventPriority.CRITICAL) {
      this.countCoalesced(eventName);
      this.sink.dispatch(eventName, ...args);
      this.totalDispatched += 1;
      this.getCounters(eventName).dispatched += 1;
      this.recordBatch(eventName, 1);
      return;
    }

    const bucket = this.buckets.get(eventName);
    if (bucket) {
      bucket.argList.push(args);
      if (priority < bucket.priority) {
        bucket.priority = priority;
      }
    } else {
      this.buckets.set(eventName, { priority, argList: [args] });
    }
    this.countCoalesced(eventName);
  }

  private flushBucket(
    eventName: EventName<TEvents>,
    bucket: QueuedEventBucket<TEvents>,
    now: number,
  ): void {
    this.buckets.delete(eventName);
    this.lastBucketFlushAt.set(eventName, now);
    for (const args of bucket.argList) {
      this.sink.dispatch(eventName, ...args);
    }
    const count = bucket.argList.length;
    this.totalDispatched += count;
    this.getCounters(eventName).dispatched += count;
    this.recordBatch(eventName, count);
  }

  private countCoalesced(eventName: string): void {
    this.totalCoalesced += 1;
    this.getCounters(eventName).coalesced += 1;
  }

  private ensureEventStats(eventName: string): void {
    this.getCounters(eventName);
    this.getBatchSizes(eventName);
  }

  private getCounters(eventName: string): MutableCounters {
    let counters = this.perEvent.get(eventName);
    if (!counters) {
      counters = { coalesced: 0, dispatched: 0 };
      this.perEvent.set(eventName, counters);
    }
    return counters;
  }

  private getBatchSizes(eventName: string): MutableBatchSizes {
    let sizes = this.batchSizes.get(eventName);
    if (!sizes) {
      sizes = { min: Number.POSITIVE_INFINITY, max: 0, total: 0, count: 0 };
      this.batchSizes.set(eventName, sizes);
    }
    return sizes;
  }

  private recordBatch(eventName: string, size: number): void {
    const sizes = this.getBatchSizes(eventName);
    sizes.min = Math.min(sizes.min, size);
    sizes.max = Math.max(sizes.max, size);
    sizes.total += size;
    sizes.count += 1;
  }
}

export function computeSavingsPercent(coalesced: number, dispatched: number): number {
  if (coalesced <= 0) {
    return 0;
  }
  const percent = ((coalesced - dispatched) / coalesced) * 100;
  return Math.min(100, Math.max(0, percent));
}

function clampDelay(value: number | undefined, minimumMs: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return DEFAULT_EVENT_DELAY_MS;
  }
  return Math.min(MAX_EVENT_DELAY_MS, Math.max(minimumMs, value));
}

function isEventPriority(value: number): value is EventPriority {
  return (
    value === EventPriority.CRITICAL ||
    value === EventPriority.HIGH ||
    value === EventPriority.MEDIUM ||
    value === EventPriority.LOW
  );
}
