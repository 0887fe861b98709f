import type { BudgetGate } from '../budget/budget-tracker.js';
import {
  getDefaultHighResolutionClock,
  type HighResolutionClock,
} from '../clock.js';
import { updatePriorityToBudgetPriority } from '../priority-mapping.js';
import { FifoQueue } from '../queues/fifo-queue.js';
import {
  createSafeTelemetry,
  describeError,
  silentTelemetry,
  type TelemetryFacade,
} from '../telemetry.js';
import {
  clampUpdatePriority,
  DEFAULT_UPDATE_PRIORITY,
  UPDATE_PRIORITY_ORDER,
  UpdatePriority,
} from './update-priority.js';
import { isLiveUpdateTarget, isUpdateTarget, type UpdateTarget } from './update-target.js';

export const DEFAULT_BASE_BATCH_SIZE = 10;
export const MIN_BATCH_SIZE = 2;
export const MAX_RELAXED_BATCH_SIZE = 16;
export const DEFAULT_DECAY_INTERVAL_MS = 5_000;
const LEVEL_ADMISSION_COST_MS = 1;
const DECAY_STEPS: readonly (readonly [UpdatePriority, UpdatePriority])[] = [
  [UpdatePriority.HIGH, UpdatePriority.CRITICAL],
  [UpdatePriority.MEDIUM, UpdatePriority.HIGH],
  [UpdatePriority.LOW, UpdatePriority.MEDIUM],
];
const COMPONENT = 'BatchScheduler';

export type AdaptiveTier = 'severe' | 'heavy' | 'elevated' | 'nominal' | 'relaxed';

export interface AdaptiveBatch {
  readonly tier: AdaptiveTier;
  /** Maximum targets processed per priority level in one cycle. */
  readonly batchSize: number;
  /** Minimum time between unforced cycles. */
  readonly minIntervalMs: number;
}

export interface CycleLoad {
  readonly mean: number;
  readonly p95: number;
}

/**
 * Derives the per-level batch size and throttle interval from recent cycle
 * load. Under load the batch shrinks (never below {@link MIN_BATCH_SIZE})
 * and cycles are spaced out; when comfortably under budget the batch grows
 * up to twice the base, capped at {@link MAX_RELAXED_BATCH_SIZE}.
 */
export function computeAdaptiveBatch(
  baseBatchSize: number,
  load: CycleLoad,
): AdaptiveBatch {
  const base = resolveBatchSize(baseBatchSize, DEFAULT_BASE_BATCH_SIZE);
  const { mean, p95 } = load;

  if (mean > 18 || p95 > 28) {
    return shrink('severe', base, 4, 30);
  }
  if (mean > 16 || p95 > 24) {
    return shrink('heavy', base, 3, 24);
  }
  if (mean > 14 || p95 > 20) {
    return shrink('elevated', base, 2, 18);
  }
  if (mean < 11 && p95 < 16) {
    return {
      tier: 'relaxed',
      batchSize: Math.min(base * 2, MAX_RELAXED_BATCH_SIZE),
      minIntervalMs: 0,
    };
  }
  return { tier: 'nominal', batchSize: base, minIntervalMs: 0 };
}

function shrink(
  tier: AdaptiveTier,
  base: number,
  divisor: number,
  minIntervalMs: number,
): AdaptiveBatch {
  return {
    tier,
    batchSize: Math.max(MIN_BATCH_SIZE, Math.floor(base / divisor)),
    minIntervalMs,
  };
}

export type BatchCycleStatus = 'disabled' | 'blocked' | 'throttled' | 'completed';

export interface BatchCycleResult {
  readonly status: BatchCycleStatus;
  readonly processed: number;
  readonly batchSize: number;
}

export interface BatchSchedulerStatistics {
  readonly processed: number;
  readonly batchesRun: number;
  readonly invalidSkipped: number;
  readonly priorityDecays: number;
  /** Re-entrant `runCycle` calls refused while a cycle was in progress. */
  readonly processingBlocks: number;
  readonly throttledCycles: number;
  /** Cycles that stopped early because a level could not be afforded. */
  readonly budgetStops: number;
  readonly updateFailures: number;
  readonly pending: number;
  readonly pendingByPriority: Readonly<Record<UpdatePriority, number>>;
  readonly lastBatchSize: number;
  readonly lastTier: AdaptiveTier;
  readonly enabled: boolean;
  readonly active: boolean;
}

export interface BatchSchedulerOptions {
  /**
   * Admission gate consulted once per priority level. Without one every
   * level is affordable and the batch size stays at its base.
   */
  readonly budget?: BudgetGate;
  readonly baseBatchSize?: number;
  readonly decayIntervalMs?: number;
  readonly enabled?: boolean;
  readonly clock?: HighResolutionClock;
  readonly telemetry?: TelemetryFacade;
  /** Invoked whenever the scheduler starts or stops needing cycles. */
  readonly onActiveChange?: (active: boolean) => void;
}

/**
 * Deduplicating, priority-tiered queue of update targets that are refreshed
 * in bounded batches. The host calls {@link BatchScheduler.runCycle} while
 * {@link BatchScheduler.isActive} reports pending work.
 */
export class BatchScheduler {
  private readonly queues = new Map<UpdatePriority, FifoQueue<UpdateTarget>>(
    UPDATE_PRIORITY_ORDER.map(
      (priority): [UpdatePriority, FifoQueue<UpdateTarget>] => [
        priority,
        new FifoQueue<UpdateTarget>(),
      ],
    ),
  );
  private readonly budget: BudgetGate | undefined;
  private readonly decayIntervalMs: number;
  private readonly clock: HighResolutionClock;
  private readonly telemetry: TelemetryFacade;
  private readonly onActiveChange: ((active: boolean) => void) | undefined;

  private baseBatchSize: number;
  private enabled: boolean;
  private active = false;
  private processing = false;
  private lastCycleAt: number | undefined;
  private lastDecayAt: number;
  private lastAdaptive: AdaptiveBatch;

  private processed = 0;
  private batchesRun = 0;
  private invalidSkipped = 0;
  private priorityDecays = 0;
  private processingBlocks = 0;
  private throttledCycles = 0;
  private budgetStops = 0;
  private updateFailures = 0;

  constructor(options: BatchSchedulerOptions = {}) {
    this.budget = options.budget;
    this.baseBatchSize = resolveBatchSize(
      options.baseBatchSize,
      DEFAULT_BASE_BATCH_SIZE,
    );
    this.decayIntervalMs =
      typeof options.decayIntervalMs === 'number' &&
      Number.isFinite(options.decayIntervalMs) &&
      options.decayIntervalMs > 0
        ? options.decayIntervalMs
        : DEFAULT_DECAY_INTERVAL_MS;
    this.enabled = options.enabled ?? true;
    this.clock = options.clock ?? getDefaultHighResolutionClock();
    this.telemetry = createSafeTelemetry(options.telemetry ?? silentTelemetry);
    this.onActiveChange = options.onActiveChange;
    this.lastDecayAt = this.clock.now();
    this.lastAdaptive = {
      tier: 'nominal',
      batchSize: this.baseBatchSize,
      minIntervalMs: 0,
    };
  }

  /**
   * Queues `target` at `priority` unless it is already queued there.
   * Returns whether the target was added. Disabled schedulers and invalid
   * targets add nothing.
   */
  markPending(
    target: UpdateTarget,
    priority: UpdatePriority = DEFAULT_UPDATE_PRIORITY,
  ): boolean {
    if (!this.enabled) {
      return false;
    }
    if (!isUpdateTarget(target)) {
      this.invalidSkipped += 1;
      return false;
    }
    const queue = this.getQueue(clampUpdatePriority(priority));
    if (queue.includes(target)) {
      return false;
    }
    queue.push(target);
    this.setActive(true);
    return true;
  }

  /**
   * Processes up to one adaptive batch per priority level, most urgent first.
   * `forceFlushAll` skips the throttle interval, the batch limit and the
   * budget check so every queued target is processed.
   */
  runCycle(forceFlushAll = false): BatchCycleResult {
    if (!this.enabled) {
      return { status: 'disabled', processed: 0, batchSize: 0 };
    }
    if (this.processing) {
      this.processingBlocks += 1;
      return { status: 'blocked', processed: 0, batchSize: 0 };
    }

    this.processing = true;
    try {
      const now = this.clock.now();
      const adaptive = this.resolveAdaptiveBatch();
      this.lastAdaptive = adaptive;

      if (
        !forceFlushAll &&
        adaptive.minIntervalMs > 0 &&
        this.lastCycleAt !== undefined &&
        now - this.lastCycleAt < adaptive.minIntervalMs
      ) {
        this.throttledCycles += 1;
        return { status: 'throttled', processed: 0, batchSize: adaptive.batchSize };
      }
      this.lastCycleAt = now;

      const processed = this.processLevels(adaptive.batchSize, forceFlushAll);

      if (now - this.lastDecayAt >= this.decayIntervalMs) {
        this.decayPriorities();
        this.lastDecayAt = now;
      }

      if (this.getPendingCount() === 0) {
        this.setActive(false);
      }
      return { status: 'completed', processed, batchSize: adaptive.batchSize };
    } finally {
      this.processing = false;
    }
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isActive(): boolean {
    return this.active;
  }

  /** Sets the base batch size; values below {@link MIN_BATCH_SIZE} are raised. */
  setBatchSize(size: number): void {
    this.baseBatchSize = resolveBatchSize(size, this.baseBatchSize);
  }

  getBatchSize(): number {
    return this.baseBatchSize;
  }

  getPendingCount(priority?: UpdatePriority): number {
    if (priority !== undefined) {
      return this.getQueue(clampUpdatePriority(priority)).size;
    }
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.size;
    }
    return total;
  }

  isPending(target: UpdateTarget, priority?: UpdatePriority): boolean {
    if (priority !== undefined) {
      return this.getQueue(clampUpdatePriority(priority)).includes(target);
    }
    for (const queue of this.queues.values()) {
      if (queue.includes(target)) {
        return true;
      }
    }
    return false;
  }

  /** Drops every queued target. */
  clear(): void {
    for (const queue of this.queues.values()) {
      queue.clear();
    }
    this.setActive(false);
  }

  resetStatistics(): void {
    this.processed = 0;
    this.batchesRun = 0;
    this.invalidSkipped = 0;
    this.priorityDecays = 0;
    this.processingBlocks = 0;
    this.throttledCycles = 0;
    this.budgetStops = 0;
    this.updateFailures = 0;
  }

  getStatistics(): BatchSchedulerStatistics {
    return Object.freeze({
      processed: this.processed,
      batchesRun: this.batchesRun,
      invalidSkipped: this.invalidSkipped,
      priorityDecays: this.priorityDecays,
      processingBlocks: this.processingBlocks,
      throttledCycles: this.throttledCycles,
      budgetStops: this.budgetStops,
      updateFailures: this.updateFailures,
      pending: this.getPendingCount(),
      pendingByPriority: Object.freeze({
        [UpdatePriority.LOW]: this.getPendingCount(UpdatePriority.LOW),
        [UpdatePriority.MEDIUM]: this.getPendingCount(UpdatePriority.MEDIUM),
        [UpdatePriority.HIGH]: this.getPendingCount(UpdatePriority.HIGH),
        [UpdatePriority.CRITICAL]: this.getPendingCount(UpdatePriority.CRITICAL),
      }),
      lastBatchSize: this.lastAdaptive.batchSize,
      lastTier: this.lastAdaptive.tier,
      enabled: this.enabled,
      active: this.active,
    });
  }

  private resolveAdaptiveBatch(): AdaptiveBatch {
    if (!this.budget) {
      return { tier: 'nominal', batchSize: this.baseBatchSize, minIntervalMs: 0 };
    }
    return computeAdaptiveBatch(this.baseBatchSize, this.budget.getStatistics());
  }

  private processLevels(batchSize: number, force: boolean): number {
    let processed = 0;

    for (const priority of UPDATE_PRIORITY_ORDER) {
      const queue = this.getQueue(priority);
      if (queue.isEmpty()) {
        continue;
      }
      if (
        !force &&
        this.budget &&
        !this.budget.canAfford(
          updatePriorityToBudgetPriority(priority),
          LEVEL_ADMISSION_COST_MS,
        )
      ) {
        this.budgetStops += 1;
        break;
      }

      // Targets marked while this level runs wait for the next cycle.
      const available = queue.size;
      const limit = force ? available : batchSize;
      let examined = 0;
      let processedAtLevel = 0;
      while (processedAtLevel < limit && examined < available) {
        const target = queue.shift();
        if (target === undefined) {
          break;
        }
        examined += 1;
        if (!isLiveUpdateTarget(target)) {
          this.invalidSkipped += 1;
          continue;
        }
        this.invoke(target, priority);
        processedAtLevel += 1;
      }

      if (processedAtLevel > 0) {
        this.batchesRun += 1;
        processed += processedAtLevel;
      }
    }

    this.processed += processed;
    return processed;
  }

  /**
   * Promotes every queued target exactly one level. Levels are visited from
   * HIGH down so a promoted target is never promoted again in the same pass.
   */
  private decayPriorities(): void {
    let moved = 0;
    for (const [from, to] of DECAY_STEPS) {
      const source = this.getQueue(from);
      const destination = this.getQueue(to);
      for (const target of source.drain()) {
        if (!destination.includes(target)) {
          destination.push(target);
          moved += 1;
        }
      }
    }
    this.priorityDecays += 1;
    if (moved > 0) {
      this.telemetry.recordProgress('PriorityDecayApplied', {
        component: COMPONENT,
        moved,
      });
    }
  }

  private invoke(target: UpdateTarget, priority: UpdatePriority): void {
    try {
      target.update();
    } catch (error) {
      this.updateFailures += 1;
      this.telemetry.recordError('UpdateTargetFailed', {
        component: COMPONENT,
        message: describeError(error),
        priority,
      });
    }
  }

  private setActive(active: boolean): void {
    if (this.active === active) {
      return;
    }
    this.active = active;
    this.onActiveChange?.(active);
  }

  private getQueue(priority: UpdatePriority): FifoQueue<UpdateTarget> {
    let queue = this.queues.get(priority);
    if (!queue) {
      queue = new FifoQueue<UpdateTarget>();
      this.queues.set(priority, queue);
    }
    return queue;
  }
}

function resolveBatchSize(value: number | undefined, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(MIN_BATCH_SIZE, Math.floor(value));
}
