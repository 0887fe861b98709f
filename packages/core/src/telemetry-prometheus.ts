/* eslint-disable no-console */

import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

import type { TelemetryEventData, TelemetryFacade } from './telemetry.js';

export interface PrometheusTelemetryOptions {
  readonly registry?: Registry;
  readonly prefix?: string;
  readonly collectDefaultMetrics?: boolean;
  /** Mirror every event to the console as well. */
  readonly log?: boolean;
}

interface BudgetMetrics {
  readonly meanMs: Gauge<string>;
  readonly p95Ms: Gauge<string>;
  readonly p99Ms: Gauge<string>;
  readonly targetMs: Gauge<string>;
  readonly deferredPending: Gauge<string>;
  readonly droppedCallbacks: Counter<string>;
  readonly callbackFailures: Counter<string>;
}

interface SchedulerMetrics {
  readonly pending: Gauge<string>;
  readonly processed: Counter<string>;
  readonly priorityDecays: Counter<string>;
  readonly processingBlocks: Counter<string>;
  readonly invalidSkipped: Counter<string>;
}

interface CoalescerMetrics {
  readonly savingsPercent: Gauge<string>;
  readonly coalesced: Counter<string>;
  readonly dispatched: Counter<string>;
  readonly budgetDefers: Counter<string>;
  readonly emergencyFlushes: Counter<string>;
}

const DEFAULT_PREFIX = 'tick_governor_';

export interface PrometheusTelemetryFacade extends TelemetryFacade {
  readonly registry: Registry;
}

/**
 * Telemetry facade backed by prom-client. Counter groups published by the
 * governor each tick (`budget`, `scheduler`, `coalescer`) carry gauges as
 * current values and counters as per-tick increments.
 */
export function createPrometheusTelemetry(
  options: PrometheusTelemetryOptions = {},
): PrometheusTelemetryFacade {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? DEFAULT_PREFIX;

  if (options.collectDefaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const counter = (name: string, help: string, labelNames: string[] = []) =>
    new Counter({
      name: `${prefix}${name}`,
      help,
      registers: [registry],
      labelNames,
    });
  const gauge = (name: string, help: string) =>
    new Gauge({ name: `${prefix}${name}`, help, registers: [registry] });

  const errors = counter(
    'telemetry_errors_total',
    'Total number of telemetry errors emitted by the governor.',
    ['event'],
  );
  const warnings = counter(
    'telemetry_warnings_total',
    'Total number of telemetry warnings emitted by the governor.',
    ['event'],
  );
  const cycles = counter('cycles_total', 'Total number of governed cycles.');
  const slowHandlers = counter(
    'events_slow_handlers_total',
    'Total number of event handler executions over the slow threshold.',
  );

  const budget: BudgetMetrics = {
    meanMs: gauge('cycle_mean_ms', 'Mean cycle duration over the sample window.'),
    p95Ms: gauge('cycle_p95_ms', 'Most recently computed 95th percentile cycle duration.'),
    p99Ms: gauge('cycle_p99_ms', 'Most recently computed 99th percentile cycle duration.'),
    targetMs: gauge('cycle_target_ms', 'Target cycle duration admission is scaled from.'),
    deferredPending: gauge('deferred_callbacks_pending', 'Deferred callbacks waiting for budget.'),
    droppedCallbacks: counter(
      'deferred_callbacks_dropped_total',
      'Total number of low-priority deferred callbacks dropped at capacity.',
    ),
    callbackFailures: counter(
      'deferred_callback_failures_total',
      'Total number of budget callbacks that threw.',
    ),
  };

  const scheduler: SchedulerMetrics = {
    pending: gauge('updates_pending', 'Update targets waiting in the batch scheduler.'),
    processed: counter('updates_processed_total', 'Total number of update targets processed.'),
    priorityDecays: counter('priority_decays_total', 'Total number of priority decay passes.'),
    processingBlocks: counter(
      'scheduler_reentrancy_blocks_total',
      'Total number of re-entrant scheduler cycles refused.',
    ),
    invalidSkipped: counter(
      'updates_invalid_skipped_total',
      'Total number of invalid or expired update targets skipped.',
    ),
  };

  const coalescer: CoalescerMetrics = {
    savingsPercent: gauge('coalescer_savings_percent', 'Share of submitted events never delivered.'),
    coalesced: counter('events_coalesced_total', 'Total number of events submitted for coalescing.'),
    dispatched: counter('events_dispatched_total', 'Total number of coalesced deliveries.'),
    budgetDefers: counter('events_budget_defers_total', 'Total number of deliveries postponed by the budget.'),
    emergencyFlushes: counter(
      'events_emergency_flushes_total',
      'Total number of deliveries forced after repeated budget defers.',
    ),
  };

  const log = options.log ?? false;
  const logError = createConsoleLogger('error', log);
  const logWarning = createConsoleLogger('warn', log);
  const logInfo = createConsoleLogger('info', log);

  const facade: PrometheusTelemetryFacade = {
    recordError(event: string, data?: TelemetryEventData) {
      errors.inc({ event });
      logError(`[telemetry:error] ${event}`, data);
    },
    recordWarning(event: string, data?: TelemetryEventData) {
      warnings.inc({ event });
      if (event === 'EventHandlerSlow') {
        slowHandlers.inc();
      }
      logWarning(`[telemetry:warning] ${event}`, data);
    },
    recordProgress(event: string, data?: TelemetryEventData) {
      logInfo(`[telemetry:progress] ${event}`, data);
    },
    recordCounters(group: string, values: Readonly<Record<string, number>>) {
      if (group === 'budget') {
        updateBudgetMetrics(budget, values);
      } else if (group === 'scheduler') {
        updateSchedulerMetrics(scheduler, values);
      } else if (group === 'coalescer') {
        updateCoalescerMetrics(coalescer, values);
      }
    },
    recordTick() {
      cycles.inc();
    },
    registry,
  };

  return facade;
}

function updateBudgetMetrics(
  metrics: BudgetMetrics,
  values: Readonly<Record<string, number>>,
): void {
  setGauge(metrics.meanMs, values.mean);
  setGauge(metrics.p95Ms, values.p95);
  setGauge(metrics.p99Ms, values.p99);
  setGauge(metrics.targetMs, values.targetCycleTimeMs);
  setGauge(metrics.deferredPending, values.deferredPending);
  incrementCounter(metrics.droppedCallbacks, values.droppedCallbacks);
  incrementCounter(metrics.callbackFailures, values.callbackFailures);
}

function updateSchedulerMetrics(
  metrics: SchedulerMetrics,
  values: Readonly<Record<string, number>>,
): void {
  setGauge(metrics.pending, values.pending);
  incrementCounter(metrics.processed, values.processed);
  incrementCounter(metrics.priorityDecays, values.priorityDecays);
  incrementCounter(metrics.processingBlocks, values.processingBlocks);
  incrementCounter(metrics.invalidSkipped, values.invalidSkipped);
}

function updateCoalescerMetrics(
  metrics: CoalescerMetrics,
  values: Readonly<Record<string, number>>,
): void {
  setGauge(metrics.savingsPercent, values.savingsPercent);
  incrementCounter(metrics.coalesced, values.coalesced);
  incrementCounter(metrics.dispatched, values.dispatched);
  incrementCounter(metrics.budgetDefers, values.budgetDefers);
  incrementCounter(metrics.emergencyFlushes, values.emergencyFlushes);
}

function setGauge(gauge: Gauge<string>, value: number | undefined): void {
  if (typeof value === 'number' && Number.isFinite(value)) {
    gauge.set(value);
  }
}

function incrementCounter(counter: Counter<string>, value: number | undefined): void {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    counter.inc(value);
  }
}

type ConsoleMethod = (message?: unknown, ...optionalParams: unknown[]) => void;

function createConsoleLogger<
  TMethod extends 'error' | 'warn' | 'info',
>(method: TMethod, enabled: boolean): ConsoleMethod {
  if (enabled && typeof console?.[method] === 'function') {
    return console[method].bind(console);
  }
  return () => {};
}
