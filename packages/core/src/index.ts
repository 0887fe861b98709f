export {
  TickGovernor,
  type GovernorSnapshot,
  type TickGovernorOptions,
} from './governor.js';

export {
  BudgetPriority,
  BudgetTracker,
  BUDGET_PRIORITY_FRACTIONS,
  BUDGET_PRIORITY_ORDER,
  DEFAULT_TARGET_CYCLE_TIME_MS,
  HISTOGRAM_BUCKET_LABELS,
  clampBudgetPriority,
  computePercentiles,
  resolveHistogramBucket,
  type BudgetGate,
  type BudgetStatistics,
  type BudgetTrackerOptions,
  type CyclePercentiles,
  type DeferOutcome,
  type DeferredCallback,
} from './budget/budget-tracker.js';
export { SampleRingBuffer } from './budget/sample-ring-buffer.js';

export {
  BatchScheduler,
  DEFAULT_BASE_BATCH_SIZE,
  DEFAULT_DECAY_INTERVAL_MS,
  MAX_RELAXED_BATCH_SIZE,
  MIN_BATCH_SIZE,
  computeAdaptiveBatch,
  type AdaptiveBatch,
  type AdaptiveTier,
  type BatchCycleResult,
  type BatchCycleStatus,
  type BatchSchedulerOptions,
  type BatchSchedulerStatistics,
  type CycleLoad,
} from './batch/batch-scheduler.js';
export {
  DEFAULT_UPDATE_PRIORITY,
  UPDATE_PRIORITY_ORDER,
  UpdatePriority,
  clampUpdatePriority,
} from './batch/update-priority.js';
export {
  LEGACY_UPDATE_REASON,
  fromLegacyTarget,
  hasLegacyUpdateCapability,
  isLiveUpdateTarget,
  isUpdateTarget,
  type LegacyUpdateMethod,
  type UpdateTarget,
} from './batch/update-target.js';

export {
  EventBus,
  type DispatchSink,
  type EventArgsMap,
  type EventBusOptions,
  type EventBusStatistics,
  type EventHandler,
  type EventName,
  type EventSubscription,
  type EventSubscriptionOptions,
  type SlowHandlerContext,
} from './events/event-bus.js';
export {
  DEFAULT_COALESCE_INTERVALS_MS,
  DEFAULT_EVENT_DELAY_MS,
  EventCoalescer,
  MAX_BUDGET_DEFERS,
  MAX_DEFER_WINDOW_MS,
  MAX_EVENT_DELAY_MS,
  MIN_ADJUSTED_EVENT_DELAY_MS,
  computeSavingsPercent,
  type CoalescedEventCounters,
  type DispatchBatchStatistics,
  type EventCoalescerOptions,
  type EventCoalescerStatistics,
} from './events/event-coalescer.js';
export {
  DEFAULT_EVENT_PRIORITY,
  EventPriority,
  clampEventPriority,
} from './events/event-priority.js';
export { DelayedWakeups } from './events/delayed-wakeups.js';

export {
  budgetPriorityToUpdatePriority,
  eventPriorityToBudgetPriority,
  updatePriorityToBudgetPriority,
} from './priority-mapping.js';

export {
  DEFAULT_GOVERNOR_CONFIG,
  mergeGovernorOverrides,
  resolveGovernorConfig,
  type CoalesceIntervalsConfig,
  type GovernorConfig,
  type GovernorConfigOverrides,
} from './config.js';
export {
  DEFAULT_PRESET_NAME,
  GOVERNOR_PRESETS,
  GOVERNOR_PRESET_NAMES,
  isGovernorPresetName,
  presetToOverrides,
  resolvePreset,
  type GovernorPreset,
  type GovernorPresetName,
  type ResolvedPreset,
} from './presets.js';
export {
  GovernorSettingsError,
  governorOverridesSchema,
  governorSettingsSchema,
  parseGovernorSettings,
  presetNameSchema,
  safeParseGovernorSettings,
  type GovernorSettings,
  type GovernorSettingsInput,
  type GovernorSettingsParseResult,
} from './config-schema.js';

export {
  PERFORMANCE_SCOPES,
  analyzePerformance,
  isPerformanceScope,
  rankEventSavings,
  type EventSavingsRow,
  type PerformanceReport,
  type PerformanceScope,
} from './diagnostics/performance-report.js';

export {
  createConsoleTelemetry,
  createSafeTelemetry,
  describeError,
  silentTelemetry,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';
export {
  getDefaultHighResolutionClock,
  getDefaultTimerHost,
  type HighResolutionClock,
  type ScheduledTimer,
  type TimerHost,
} from './clock.js';
export { FifoQueue } from './queues/fifo-queue.js';
