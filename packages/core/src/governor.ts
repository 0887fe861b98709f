import {
  getDefaultHighResolutionClock,
  getDefaultTimerHost,
  type HighResolutionClock,
  type TimerHost,
} from './clock.js';
import {
  mergeGovernorOverrides,
  resolveGovernorConfig,
  type GovernorConfig,
  type GovernorConfigOverrides,
} from './config.js';
import { parseGovernorSettings } from './config-schema.js';
import {
  presetToOverrides,
  resolvePreset,
  type GovernorPreset,
  type GovernorPresetName,
} from './presets.js';
import {
  BatchScheduler,
  type BatchCycleResult,
  type BatchSchedulerStatistics,
} from './batch/batch-scheduler.js';
import {
  DEFAULT_UPDATE_PRIORITY,
  type UpdatePriority,
} from './batch/update-priority.js';
import type { UpdateTarget } from './batch/update-target.js';
import {
  BudgetTracker,
  type BudgetPriority,
  type BudgetStatistics,
  type DeferOutcome,
  type DeferredCallback,
} from './budget/budget-tracker.js';
import {
  EventBus,
  type EventArgsMap,
  type EventBusStatistics,
  type EventHandler,
  type EventName,
  type EventSubscription,
  type EventSubscriptionOptions,
} from './events/event-bus.js';
import {
  EventCoalescer,
  type EventCoalescerStatistics,
} from './events/event-coalescer.js';
import { EventPriority } from './events/event-priority.js';
import {
  createSafeTelemetry,
  silentTelemetry,
  type TelemetryFacade,
} from './telemetry.js';

const COMPONENT = 'TickGovernor';

export interface TickGovernorOptions {
  /** Preset applied before `overrides`. Unknown names fall back to `medium`. */
  readonly preset?: string;
  readonly overrides?: GovernorConfigOverrides;
  readonly enabled?: boolean;
  readonly clock?: HighResolutionClock;
  readonly timerHost?: TimerHost;
  readonly telemetry?: TelemetryFacade;
}

export interface GovernorSnapshot {
  readonly preset: GovernorPresetName | undefined;
  readonly enabled: boolean;
  readonly cycles: number;
  readonly budget: BudgetStatistics;
  readonly scheduler: BatchSchedulerStatistics;
  readonly coalescer: EventCoalescerStatistics;
  readonly bus: EventBusStatistics;
}

/**
 * Converts cumulative statistics into per-tick increments for
 * {@link TelemetryFacade.recordCounters}. A value lower than the last one
 * seen means the source was reset, so the whole value counts.
 */
class CounterDeltas {
  private readonly last = new Map<string, number>();

  take(key: string, value: number): number {
    const previous = this.last.get(key) ?? 0;
    this.last.set(key, value);
    return value >= previous ? value - previous : value;
  }
}

/**
 * Owns one budget tracker, batch scheduler, event coalescer and event bus
 * and drives them from the host's cycle loop through {@link tick}.
 */
export class TickGovernor<TEvents extends EventArgsMap = EventArgsMap> {
  readonly config: GovernorConfig;

  private readonly tracker: BudgetTracker;
  private readonly scheduler: BatchScheduler;
  private readonly coalescer: EventCoalescer<TEvents>;
  private readonly bus: EventBus<TEvents>;
  private readonly telemetry: TelemetryFacade;
  private readonly deltas = new CounterDeltas();

  private presetName: GovernorPresetName | undefined;
  private enabled: boolean;
  private cycles = 0;
  private disposed = false;

  /**
   * Validates an untrusted settings document and builds a governor from it.
   * Throws {@link GovernorSettingsError} when the document is malformed.
   */
  static fromSettings<TEvents extends EventArgsMap = EventArgsMap>(
    input: unknown,
    options: Omit<TickGovernorOptions, 'preset' | 'overrides' | 'enabled'> = {},
  ): TickGovernor<TEvents> {
    const settings = parseGovernorSettings(input);
    return new TickGovernor<TEvents>({
      ...options,
      preset: settings.preset,
      overrides: settings.overrides,
      enabled: settings.enabled,
    });
  }

  constructor(options: TickGovernorOptions = {}) {
    const clock = options.clock ?? getDefaultHighResolutionClock();
    const timerHost = options.timerHost ?? getDefaultTimerHost();
    this.telemetry = createSafeTelemetry(options.telemetry ?? silentTelemetry);
    this.enabled = options.enabled ?? true;

    let presetOverrides: GovernorConfigOverrides | undefined;
    if (options.preset !== undefined) {
      const preset = this.resolvePresetOrWarn(options.preset);
      this.presetName = preset.name;
      presetOverrides = presetToOverrides(preset);
    }
    this.config = resolveGovernorConfig(
      mergeGovernorOverrides(presetOverrides, options.overrides),
    );

    const { budget, batch, coalescer, bus } = this.config;
    this.tracker = new BudgetTracker({
      ...budget,
      clock,
      telemetry: this.telemetry,
    });
    this.scheduler = new BatchScheduler({
      budget: this.tracker,
      baseBatchSize: batch.baseBatchSize,
      decayIntervalMs: batch.decayIntervalMs,
      enabled: this.enabled,
      clock,
      telemetry: this.telemetry,
    });
    this.bus = new EventBus<TEvents>({
      clock,
      telemetry: this.telemetry,
      slowHandlerThresholdMs: bus.slowHandlerThresholdMs,
    });
    this.coalescer = new EventCoalescer<TEvents>({
      sink: this.bus,
      budget: this.tracker,
      enabled: this.enabled,
      coalesceIntervalsMs: {
        [EventPriority.CRITICAL]: coalescer.coalesceIntervalsMs.critical,
        [EventPriority.HIGH]: coalescer.coalesceIntervalsMs.high,
        [EventPriority.MEDIUM]: coalescer.coalesceIntervalsMs.medium,
        [EventPriority.LOW]: coalescer.coalesceIntervalsMs.low,
      },
      clock,
      timerHost,
      telemetry: this.telemetry,
    });
  }

  /**
   * Runs one governed cycle: records `elapsedMs` (draining deferred
   * callbacks), processes a batch when updates are pending, flushes due
   * events and publishes counters. Returns the batch result when the
   * scheduler ran.
   */
  tick(elapsedMs: number): BatchCycleResult | undefined {
    if (this.disposed) {
      return undefined;
    }
    this.tracker.recordCycle(elapsedMs);

    let batch: BatchCycleResult | undefined;
    if (this.scheduler.isActive()) {
      batch = this.scheduler.runCycle();
    }
    this.coalescer.tick();

    this.cycles += 1;
    this.telemetry.recordTick();
    this.publishCounters();
    return batch;
  }

  markPending(
    target: UpdateTarget,
    priority: UpdatePriority = DEFAULT_UPDATE_PRIORITY,
  ): boolean {
    if (this.disposed) {
      return false;
    }
    return this.scheduler.markPending(target, priority);
  }

  /** Subscribes `handler` to every delivery of `eventName` through the bus. */
  on<TName extends EventName<TEvents>>(
    eventName: TName,
    handler: EventHandler<TEvents[TName]>,
    options?: EventSubscriptionOptions,
  ): EventSubscription {
    return this.bus.on(eventName, handler, options);
  }

  registerCoalesced<TName extends EventName<TEvents>>(
    eventName: TName,
    delayMs: number | undefined,
    subscriber: EventHandler<TEvents[TName]>,
    priority?: EventPriority,
  ): boolean {
    return this.coalescer.registerCoalesced(eventName, delayMs, subscriber, priority);
  }

  submit<TName extends EventName<TEvents>>(
    eventName: TName,
    priority: EventPriority | undefined,
    ...args: TEvents[TName]
  ): void {
    if (this.disposed) {
      return;
    }
    this.coalescer.submit(eventName, priority, ...args);
  }

  deferOrRun<TContext>(
    callback: DeferredCallback<TContext>,
    priority: BudgetPriority,
    context: TContext,
  ): DeferOutcome {
    if (this.disposed) {
      return 'dropped';
    }
    return this.tracker.deferOrRun(callback, priority, context);
  }

  /**
   * Applies a preset's target cycle time, base batch size and ad-hoc
   * coalescing intervals. Returns the name of the preset actually applied.
   */
  applyPreset(name: string): GovernorPresetName {
    const preset = this.resolvePresetOrWarn(name);
    const intervals = presetToOverrides(preset).coalescer?.coalesceIntervalsMs;

    this.tracker.setTargetCycleTime(preset.targetCycleTimeMs);
    this.scheduler.setBatchSize(preset.baseBatchSize);
    this.coalescer.setCoalesceInterval(EventPriority.HIGH, intervals?.high);
    this.coalescer.setCoalesceInterval(EventPriority.MEDIUM, intervals?.medium);
    this.coalescer.setCoalesceInterval(EventPriority.LOW, intervals?.low);
    this.presetName = preset.name;

    this.telemetry.recordProgress('GovernorPresetApplied', {
      component: COMPONENT,
      preset: preset.name,
    });
    return preset.name;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    this.scheduler.setEnabled(enabled);
    this.coalescer.setEnabled(enabled);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Forces every pending update and coalesced event through at once. Hosts
   * call this when entering or leaving a mode whose state must be current
   * immediately.
   */
  notifyModeTransition(): void {
    if (this.disposed) {
      return;
    }
    this.scheduler.runCycle(true);
    this.coalescer.flush();
  }

  getEventBus(): EventBus<TEvents> {
    return this.bus;
  }

  getBudgetTracker(): BudgetTracker {
    return this.tracker;
  }

  getBatchScheduler(): BatchScheduler {
    return this.scheduler;
  }

  getEventCoalescer(): EventCoalescer<TEvents> {
    return this.coalescer;
  }

  getSnapshot(): GovernorSnapshot {
    return Object.freeze({
      preset: this.presetName,
      enabled: this.enabled,
      cycles: this.cycles,
      budget: this.tracker.getStatistics(),
      scheduler: this.scheduler.getStatistics(),
      coalescer: this.coalescer.getStatistics(),
      bus: this.bus.getStatistics(),
    });
  }

  /**
   * Cancels pending wake-ups and drops every subscription. Later ticks,
   * marks, submits and deferred callbacks are ignored.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.coalescer.dispose();
    this.scheduler.clear();
    this.bus.clear();
  }

  private resolvePresetOrWarn(name: string): GovernorPreset {
    const resolved = resolvePreset(name);
    if (resolved.fellBack) {
      this.telemetry.recordWarning('GovernorPresetUnknown', {
        component: COMPONENT,
        message: `Unknown preset "${name}", using "${resolved.preset.name}".`,
        requested: name,
        preset: resolved.preset.name,
      });
    }
    return resolved.preset;
  }

  private publishCounters(): void {
    const budget = this.tracker.getStatistics();
    this.telemetry.recordCounters('budget', {
      mean: budget.mean,
      p95: budget.p95,
      p99: budget.p99,
      targetCycleTimeMs: budget.targetCycleTimeMs,
      deferredPending: budget.deferredPending,
      droppedCallbacks: this.deltas.take('droppedCallbacks', budget.droppedCallbacks),
      callbackFailures: this.deltas.take('callbackFailures', budget.callbackFailures),
    });

    const scheduler = this.scheduler.getStatistics();
    this.telemetry.recordCounters('scheduler', {
      pending: scheduler.pending,
      processed: this.deltas.take('processed', scheduler.processed),
      priorityDecays: this.deltas.take('priorityDecays', scheduler.priorityDecays),
      processingBlocks: this.deltas.take('processingBlocks', scheduler.processingBlocks),
      invalidSkipped: this.deltas.take('invalidSkipped', scheduler.invalidSkipped),
    });

    const coalescer = this.coalescer.getStatistics();
    this.telemetry.recordCounters('coalescer', {
      savingsPercent: coalescer.savingsPercent,
      coalesced: this.deltas.take('coalesced', coalescer.totalCoalesced),
      dispatched: this.deltas.take('dispatched', coalescer.totalDispatched),
      budgetDefers: this.deltas.take('budgetDefers', coalescer.budgetDefers),
      emergencyFlushes: this.deltas.take('emergencyFlushes', coalescer.emergencyFlushes),
    });
  }
}
