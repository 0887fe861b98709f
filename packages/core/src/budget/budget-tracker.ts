import {
  getDefaultHighResolutionClock,
  type HighResolutionClock,
} from '../clock.js';
import { FifoQueue } from '../queues/fifo-queue.js';
import {
  createSafeTelemetry,
  describeError,
  silentTelemetry,
  type TelemetryFacade,
} from '../telemetry.js';
import { SampleRingBuffer } from './sample-ring-buffer.js';

/**
 * Admission priorities used by the budget tracker. Lower values are more
 * urgent: `CRITICAL` (1) is always admitted, `LOW` (4) gets the smallest
 * share of the cycle budget and is the only level whose deferred callbacks
 * may be dropped.
 */
export enum BudgetPriority {
  CRITICAL = 1,
  HIGH = 2,
  MEDIUM = 3,
  LOW = 4,
}

/** Most urgent first. */
export const BUDGET_PRIORITY_ORDER: readonly BudgetPriority[] = Object.freeze([
  BudgetPriority.CRITICAL,
  BudgetPriority.HIGH,
  BudgetPriority.MEDIUM,
  BudgetPriority.LOW,
]);

/**
 * Share of the target cycle time a non-critical priority may consume before
 * admission is refused.
 */
export const BUDGET_PRIORITY_FRACTIONS: Readonly<
  Record<Exclude<BudgetPriority, BudgetPriority.CRITICAL>, number>
> = Object.freeze({
  [BudgetPriority.HIGH]: 0.75,
  [BudgetPriority.MEDIUM]: 0.6,
  [BudgetPriority.LOW]: 0.4,
});

export const HISTOGRAM_BUCKET_LABELS = Object.freeze([
  '<5ms',
  '<10ms',
  '<15ms',
  '<20ms',
  '<30ms',
  '>=30ms',
] as const);

const HISTOGRAM_UPPER_BOUNDS_MS: readonly number[] = [5, 10, 15, 20, 30];

export const DEFAULT_TARGET_CYCLE_TIME_MS = 16.67;
const DEFAULT_SAMPLE_CAPACITY = 100;
const DEFAULT_PERCENTILE_INTERVAL_CYCLES = 30;
const DEFAULT_MAX_DEFERRED_PER_PRIORITY = 200;
const DEFAULT_MAX_DRAIN_PER_CYCLE = 5;
const IMMEDIATE_RUN_COST_MS = 0.5;
const DRAIN_COST_MS = 1;
const COMPONENT = 'BudgetTracker';

export interface CyclePercentiles {
  readonly p50: number;
  readonly p95: number;
  readonly p99: number;
}

export interface BudgetStatistics extends CyclePercentiles {
  readonly mean: number;
  readonly min: number;
  readonly max: number;
  /** Counts per {@link HISTOGRAM_BUCKET_LABELS} bucket. */
  readonly histogram: readonly number[];
  readonly sampleCount: number;
  readonly totalCycles: number;
  /** Cycle count at the last percentile recomputation. */
  readonly percentilesUpdatedAtCycle: number;
  readonly rejectedSamples: number;
  readonly targetCycleTimeMs: number;
  readonly deferredPending: number;
  readonly deferredTotal: number;
  readonly droppedCallbacks: number;
  readonly callbackFailures: number;
}

/**
 * Read-only admission surface handed to the batch scheduler and the event
 * coalescer.
 */
export interface BudgetGate {
  canAfford(priority: BudgetPriority, estimatedCostMs: number): boolean;
  getStatistics(): BudgetStatistics;
}

export type DeferOutcome = 'ran-immediately' | 'deferred' | 'dropped';

export type DeferredCallback<TContext> = (context: TContext) => void;

export interface BudgetTrackerOptions {
  readonly targetCycleTimeMs?: number;
  readonly sampleCapacity?: number;
  /** Percentiles are recomputed every this many recorded cycles. */
  readonly percentileIntervalCycles?: number;
  /** Soft cap per priority; only `LOW` callbacks are dropped once reached. */
  readonly maxDeferredPerPriority?: number;
  /** Global cap on deferred callbacks executed by one drain pass. */
  readonly maxDeferredDrainPerCycle?: number;
  readonly clock?: HighResolutionClock;
  readonly telemetry?: TelemetryFacade;
}

interface DeferredEntry {
  readonly priority: BudgetPriority;
  readonly run: () => void;
}

export class BudgetTracker implements BudgetGate {
  private readonly samples: SampleRingBuffer;
  private readonly percentileIntervalCycles: number;
  private readonly maxDeferredPerPriority: number;
  private readonly maxDeferredDrainPerCycle: number;
  private readonly clock: HighResolutionClock;
  private readonly telemetry: TelemetryFacade;
  private readonly deferredQueues = new Map<BudgetPriority, FifoQueue<DeferredEntry>>(
    BUDGET_PRIORITY_ORDER.map(
      (priority): [BudgetPriority, FifoQueue<DeferredEntry>] => [
        priority,
        new FifoQueue<DeferredEntry>(),
      ],
    ),
  );

  private targetCycleTimeMs: number;
  private minMs = Number.POSITIVE_INFINITY;
  private maxMs = 0;
  private histogram: number[] = new Array<number>(HISTOGRAM_BUCKET_LABELS.length).fill(0);
  private percentiles: CyclePercentiles = { p50: 0, p95: 0, p99: 0 };
  private percentilesUpdatedAtCycle = 0;
  private totalCycles = 0;
  private rejectedSamples = 0;
  private deferredTotal = 0;
  private droppedCallbacks = 0;
  private callbackFailures = 0;
  private lastMarkAt: number | undefined;

  constructor(options: BudgetTrackerOptions = {}) {
    this.targetCycleTimeMs = resolvePositiveNumber(
      options.targetCycleTimeMs,
      DEFAULT_TARGET_CYCLE_TIME_MS,
    );
    this.samples = new SampleRingBuffer(
      clampPositiveInteger(options.sampleCapacity, DEFAULT_SAMPLE_CAPACITY),
    );
    this.percentileIntervalCycles = clampPositiveInteger(
      options.percentileIntervalCycles,
      DEFAULT_PERCENTILE_INTERVAL_CYCLES,
    );
    this.maxDeferredPerPriority = clampPositiveInteger(
      options.maxDeferredPerPriority,
      DEFAULT_MAX_DEFERRED_PER_PRIORITY,
    );
    this.maxDeferredDrainPerCycle = clampPositiveInteger(
      options.maxDeferredDrainPerCycle,
      DEFAULT_MAX_DRAIN_PER_CYCLE,
    );
    this.clock = options.clock ?? getDefaultHighResolutionClock();
    this.telemetry = createSafeTelemetry(options.telemetry ?? silentTelemetry);
  }

  /**
   * Records one cycle duration and then drains ready deferred callbacks.
   * Non-finite or negative durations are counted and ignored.
   */
  recordCycle(elapsedMs: number): void {
    if (!Number.isFinite(elapsedMs) || elapsedMs < 0) {
      this.rejectedSamples += 1;
      return;
    }

    this.samples.push(elapsedMs);
    this.totalCycles += 1;
    if (elapsedMs < this.minMs) {
      this.minMs = elapsedMs;
    }
    if (elapsedMs > this.maxMs) {
      this.maxMs = elapsedMs;
    }
    this.histogram[resolveHistogramBucket(elapsedMs)] += 1;

    // Percentiles are intentionally stale for up to one interval.
    if (this.totalCycles % this.percentileIntervalCycles === 0) {
      this.percentiles = computePercentiles(this.samples.toArray());
      this.percentilesUpdatedAtCycle = this.totalCycles;
    }

    this.drainDeferred();
  }

  /**
   * Measures the time since the previous call with the tracker's clock and
   * records it. The first call only establishes the reference point and
   * returns `undefined`.
   */
  markCycle(): number | undefined {
    const now = this.clock.now();
    const previous = this.lastMarkAt;
    this.lastMarkAt = now;
    if (previous === undefined) {
      return undefined;
    }
    const elapsedMs = Math.max(0, now - previous);
    this.recordCycle(elapsedMs);
    return elapsedMs;
  }

  /**
   * Mean-based soft admission gate: `mean + cost` must fit within the
   * priority's share of the target cycle time. `CRITICAL` always passes.
   */
  canAfford(priority: BudgetPriority, estimatedCostMs: number): boolean {
    const resolved = clampBudgetPriority(priority);
    if (resolved === BudgetPriority.CRITICAL) {
      return true;
    }
    const cost =
      Number.isFinite(estimatedCostMs) && estimatedCostMs > 0
        ? estimatedCostMs
        : 0;
    const threshold =
      this.targetCycleTimeMs * BUDGET_PRIORITY_FRACTIONS[resolved];
    return this.samples.mean() + cost <= threshold;
  }

  /**
   * Runs `callback` now when the priority can afford it, otherwise queues it
   * for a later drain. Once a priority's queue holds
   * `maxDeferredPerPriority` callbacks, `LOW` callbacks are dropped; every
   * other priority keeps growing past the cap.
   */
  deferOrRun<TContext>(
    callback: DeferredCallback<TContext>,
    priority: BudgetPriority,
    context: TContext,
  ): DeferOutcome {
    const resolved = clampBudgetPriority(priority);
    const run = () => callback(context);

    if (this.canAfford(resolved, IMMEDIATE_RUN_COST_MS)) {
      this.invoke(run, resolved, 'immediate');
      return 'ran-immediately';
    }

    const queue = this.getQueue(resolved);
    if (
      queue.size >= this.maxDeferredPerPriority &&
      resolved === BudgetPriority.LOW
    ) {
      this.droppedCallbacks += 1;
      this.telemetry.recordWarning('DeferredCallbackDropped', {
        component: COMPONENT,
        message: `Deferred queue for priority ${resolved} is full (${queue.size}).`,
        priority: resolved,
        droppedCallbacks: this.droppedCallbacks,
      });
      return 'dropped';
    }

    queue.push({ priority: resolved, run });
    this.deferredTotal += 1;
    return 'deferred';
  }

  /**
   * Executes queued callbacks from the most urgent priority down, stopping at
   * the first priority that cannot currently afford work and after
   * `maxDeferredDrainPerCycle` callbacks in total. Returns the number run.
   */
  drainDeferred(): number {
    let processed = 0;

    for (const priority of BUDGET_PRIORITY_ORDER) {
      if (!this.canAfford(priority, DRAIN_COST_MS)) {
        break;
      }

      const queue = this.getQueue(priority);
      let entry = queue.shift();
      while (entry !== undefined) {
        this.invoke(entry.run, entry.priority, 'deferred');
        processed += 1;
        if (processed >= this.maxDeferredDrainPerCycle) {
          return processed;
        }
        entry = queue.shift();
      }
    }

    return processed;
  }

  setTargetCycleTime(targetMs: number): void {
    this.targetCycleTimeMs = resolvePositiveNumber(
      targetMs,
      DEFAULT_TARGET_CYCLE_TIME_MS,
    );
  }

  getTargetCycleTime(): number {
    return this.targetCycleTimeMs;
  }

  getPendingDeferredCount(priority?: BudgetPriority): number {
    if (priority !== undefined) {
      return this.getQueue(clampBudgetPriority(priority)).size;
    }
    let total = 0;
    for (const queue of this.deferredQueues.values()) {
      total += queue.size;
    }
    return total;
  }

  getStatistics(): BudgetStatistics {
    return Object.freeze({
      mean: this.samples.mean(),
      min: this.totalCycles === 0 ? 0 : this.minMs,
      max: this.maxMs,
      p50: this.percentiles.p50,
      p95: this.percentiles.p95,
      p99: this.percentiles.p99,
      histogram: Object.freeze([...this.histogram]),
      sampleCount: this.samples.size,
      totalCycles: this.totalCycles,
      percentilesUpdatedAtCycle: this.percentilesUpdatedAtCycle,
      rejectedSamples: this.rejectedSamples,
      targetCycleTimeMs: this.targetCycleTimeMs,
      deferredPending: this.getPendingDeferredCount(),
      deferredTotal: this.deferredTotal,
      droppedCallbacks: this.droppedCallbacks,
      callbackFailures: this.callbackFailures,
    });
  }

  /**
   * Clears samples and statistics. Queued deferred callbacks are kept and
   * still run on later drains.
   */
  reset(): void {
    this.samples.clear();
    this.minMs = Number.POSITIVE_INFINITY;
    this.maxMs = 0;
    this.histogram = new Array<number>(HISTOGRAM_BUCKET_LABELS.length).fill(0);
    this.percentiles = { p50: 0, p95: 0, p99: 0 };
    this.percentilesUpdatedAtCycle = 0;
    this.totalCycles = 0;
    this.rejectedSamples = 0;
    this.deferredTotal = 0;
    this.droppedCallbacks = 0;
    this.callbackFailures = 0;
    this.lastMarkAt = undefined;
  }

  private getQueue(priority: BudgetPriority): FifoQueue<DeferredEntry> {
    let queue = this.deferredQueues.get(priority);
    if (!queue) {
      queue = new FifoQueue<DeferredEntry>();
      this.deferredQueues.set(priority, queue);
    }
    return queue;
  }

  private invoke(
    run: () => void,
    priority: BudgetPriority,
    mode: 'immediate' | 'deferred',
  ): void {
    try {
      run();
    } catch (error) {
      this.callbackFailures += 1;
      this.telemetry.recordError('BudgetCallbackFailed', {
        component: COMPONENT,
        message: describeError(error),
        priority,
        mode,
      });
    }
  }
}

/**
 * Nearest-rank percentiles over an unsorted sample set. Returns zeros for an
 * empty set.
 */
export function computePercentiles(samples: readonly number[]): CyclePercentiles {
  const count = samples.length;
  if (count === 0) {
    return { p50: 0, p95: 0, p99: 0 };
  }
  const sorted = [...samples].sort((left, right) => left - right);
  return {
    p50: sorted[nearestRankIndex(count, 0.5)],
    p95: sorted[nearestRankIndex(count, 0.95)],
    p99: sorted[nearestRankIndex(count, 0.99)],
  };
}

export function resolveHistogramBucket(durationMs: number): number {
  for (let index = 0; index < HISTOGRAM_UPPER_BOUNDS_MS.length; index += 1) {
    if (durationMs < HISTOGRAM_UPPER_BOUNDS_MS[index]) {
      return index;
    }
  }
  return HISTOGRAM_UPPER_BOUNDS_MS.length;
}

/**
 * Maps any numeric input onto the closest budget priority. Non-numeric input
 * resolves to `MEDIUM`.
 */
export function clampBudgetPriority(value: unknown): BudgetPriority {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return BudgetPriority.MEDIUM;
  }
  const rounded = Math.round(value);
  if (rounded <= BudgetPriority.CRITICAL) {
    return BudgetPriority.CRITICAL;
  }
  if (rounded === BudgetPriority.HIGH) {
    return BudgetPriority.HIGH;
  }
  if (rounded === BudgetPriority.MEDIUM) {
    return BudgetPriority.MEDIUM;
  }
  return BudgetPriority.LOW;
}

function nearestRankIndex(count: number, quantile: number): number {
  return Math.min(count - 1, Math.max(0, Math.ceil(count * quantile) - 1));
}

function resolvePositiveNumber(
  value: number | undefined,
  fallback: number,
): number {
  if (
    typeof value === 'number' &&
    Number.isFinite(value) &&
    value > 0
  ) {
    return value;
  }
  return fallback;
}

function clampPositiveInteger(
  value: number | undefined,
  fallback: number,
): number {
  if (
    typeof value === 'number' &&
    Number.isFinite(value) &&
    value > 0
  ) {
    return Math.max(1, Math.floor(value));
  }
  return Math.max(1, Math.floor(fallback));
}
