export interface CoalesceIntervalsConfig {
  readonly critical: number;
  readonly high: number;
  readonly medium: number;
  readonly low: number;
}

export interface GovernorConfig {
  readonly budget: {
    /**
     * Cycle duration the admission thresholds are scaled from.
     *
     * @defaultValue `16.67`
     */
    readonly targetCycleTimeMs: number;
    /**
     * Number of recent cycle samples retained for the mean and percentiles.
     *
     * @defaultValue `100`
     */
    readonly sampleCapacity: number;
    /**
     * Percentiles are recomputed every this many recorded cycles.
     *
     * @defaultValue `30`
     */
    readonly percentileIntervalCycles: number;
    /**
     * Soft cap per deferred-callback queue. Only the lowest priority drops
     * callbacks once it is reached.
     *
     * @defaultValue `200`
     */
    readonly maxDeferredPerPriority: number;
    /**
     * Deferred callbacks executed per drain pass across all priorities.
     *
     * @defaultValue `5`
     */
    readonly maxDeferredDrainPerCycle: number;
  };
  readonly batch: {
    /**
     * Per-level batch size before load adaptation. Never below 2.
     *
     * @defaultValue `10`
     */
    readonly baseBatchSize: number;
    /**
     * Interval between priority decay passes.
     *
     * @defaultValue `5000`
     */
    readonly decayIntervalMs: number;
  };
  readonly coalescer: {
    /**
     * Flush interval for unregistered events, per priority.
     *
     * @defaultValue `{ critical: 0, high: 10, medium: 30, low: 50 }`
     */
    readonly coalesceIntervalsMs: CoalesceIntervalsConfig;
  };
  readonly bus: {
    /**
     * Handlers slower than this are reported. `0` disables handler timing.
     *
     * @defaultValue `0`
     */
    readonly slowHandlerThresholdMs: number;
  };
}

export type GovernorConfigOverrides = Readonly<{
  readonly budget?: Partial<GovernorConfig['budget']>;
  readonly batch?: Partial<GovernorConfig['batch']>;
  readonly coalescer?: {
    readonly coalesceIntervalsMs?: Partial<CoalesceIntervalsConfig>;
  };
  readonly bus?: Partial<GovernorConfig['bus']>;
}>;

export const DEFAULT_GOVERNOR_CONFIG: GovernorConfig = Object.freeze({
  budget: Object.freeze({
    targetCycleTimeMs: 16.67,
    sampleCapacity: 100,
    percentileIntervalCycles: 30,
    maxDeferredPerPriority: 200,
    maxDeferredDrainPerCycle: 5,
  }),
  batch: Object.freeze({
    baseBatchSize: 10,
    decayIntervalMs: 5_000,
  }),
  coalescer: Object.freeze({
    coalesceIntervalsMs: Object.freeze({
      critical: 0,
      high: 10,
      medium: 30,
      low: 50,
    }),
  }),
  bus: Object.freeze({
    slowHandlerThresholdMs: 0,
  }),
});

const MIN_BASE_BATCH_SIZE = 2;

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toPositiveNumber(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric !== undefined && numeric > 0 ? numeric : undefined;
}

function toNonNegativeNumber(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric !== undefined && numeric >= 0 ? numeric : undefined;
}

function toPositiveInt(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || numeric <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(numeric));
}

function resolveBudgetConfig(
  overrides: GovernorConfigOverrides['budget'] | undefined,
): GovernorConfig['budget'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_GOVERNOR_CONFIG.budget;

  return {
    targetCycleTimeMs:
      toPositiveNumber(source.targetCycleTimeMs) ?? defaults.targetCycleTimeMs,
    sampleCapacity: toPositiveInt(source.sampleCapacity) ?? defaults.sampleCapacity,
    percentileIntervalCycles:
      toPositiveInt(source.percentileIntervalCycles) ??
      defaults.percentileIntervalCycles,
    maxDeferredPerPriority:
      toPositiveInt(source.maxDeferredPerPriority) ?? defaults.maxDeferredPerPriority,
    maxDeferredDrainPerCycle:
      toPositiveInt(source.maxDeferredDrainPerCycle) ??
      defaults.maxDeferredDrainPerCycle,
  };
}

function resolveBatchConfig(
  overrides: GovernorConfigOverrides['batch'] | undefined,
): GovernorConfig['batch'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_GOVERNOR_CONFIG.batch;
  const baseBatchSize = toPositiveInt(source.baseBatchSize);

  return {
    baseBatchSize:
      baseBatchSize === undefined
        ? defaults.baseBatchSize
        : Math.max(MIN_BASE_BATCH_SIZE, baseBatchSize),
    decayIntervalMs:
      toPositiveNumber(source.decayIntervalMs) ?? defaults.decayIntervalMs,
  };
}

function resolveCoalescerConfig(
  overrides: GovernorConfigOverrides['coalescer'] | undefined,
): GovernorConfig['coalescer'] {
  const source = overrides?.coalesceIntervalsMs ?? {};
  const defaults = DEFAULT_GOVERNOR_CONFIG.coalescer.coalesceIntervalsMs;

  return {
    coalesceIntervalsMs: Object.freeze({
      critical: toNonNegativeNumber(source.critical) ?? defaults.critical,
      high: toNonNegativeNumber(source.high) ?? defaults.high,
      medium: toNonNegativeNumber(source.medium) ?? defaults.medium,
      low: toNonNegativeNumber(source.low) ?? defaults.low,
    }),
  };
}

function resolveBusConfig(
  overrides: GovernorConfigOverrides['bus'] | undefined,
): GovernorConfig['bus'] {
  const source = overrides ?? {};
  return {
    slowHandlerThresholdMs:
      toNonNegativeNumber(source.slowHandlerThresholdMs) ??
      DEFAULT_GOVERNOR_CONFIG.bus.slowHandlerThresholdMs,
  };
}

/**
 * Merges partial overrides onto {@link DEFAULT_GOVERNOR_CONFIG}. Non-finite,
 * negative or otherwise out-of-range values fall back to the defaults.
 */
export function resolveGovernorConfig(
  overrides?: GovernorConfigOverrides,
): GovernorConfig {
  return Object.freeze({
    budget: Object.freeze(resolveBudgetConfig(overrides?.budget)),
    batch: Object.freeze(resolveBatchConfig(overrides?.batch)),
    coalescer: Object.freeze(resolveCoalescerConfig(overrides?.coalescer)),
    bus: Object.freeze(resolveBusConfig(overrides?.bus)),
  });
}

/**
 * Layers `overrides` onto `base`, section by section. Later values win.
 */
export function mergeGovernorOverrides(
  base: GovernorConfigOverrides | undefined,
  overrides: GovernorConfigOverrides | undefined,
): GovernorConfigOverrides {
  return {
    budget: { ...base?.budget, ...overrides?.budget },
    batch: { ...base?.batch, ...overrides?.batch },
    coalescer: {
      coalesceIntervalsMs: {
        ...base?.coalescer?.coalesceIntervalsMs,
        ...overrides?.coalescer?.coalesceIntervalsMs,
      },
    },
    bus: { ...base?.bus, ...overrides?.bus },
  };
}
