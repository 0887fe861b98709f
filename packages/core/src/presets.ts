import type { GovernorConfigOverrides } from './config.js';

export const GOVERNOR_PRESET_NAMES = ['low', 'medium', 'high', 'ultra'] as const;

export type GovernorPresetName = (typeof GOVERNOR_PRESET_NAMES)[number];

export const DEFAULT_PRESET_NAME: GovernorPresetName = 'medium';

export interface GovernorPreset {
  readonly name: GovernorPresetName;
  /** Medium-priority ad-hoc interval; high and low intervals derive from it. */
  readonly coalesceIntervalMs: number;
  readonly baseBatchSize: number;
  readonly targetCycleTimeMs: number;
}

export const GOVERNOR_PRESETS: Readonly<Record<GovernorPresetName, GovernorPreset>> =
  Object.freeze({
    low: Object.freeze({
      name: 'low',
      coalesceIntervalMs: 50,
      baseBatchSize: 2,
      targetCycleTimeMs: 25,
    }),
    medium: Object.freeze({
      name: 'medium',
      coalesceIntervalMs: 30,
      baseBatchSize: 10,
      targetCycleTimeMs: 16.67,
    }),
    high: Object.freeze({
      name: 'high',
      coalesceIntervalMs: 20,
      baseBatchSize: 20,
      targetCycleTimeMs: 14,
    }),
    ultra: Object.freeze({
      name: 'ultra',
      coalesceIntervalMs: 10,
      baseBatchSize: 40,
      targetCycleTimeMs: 10,
    }),
  });

const MIN_HIGH_PRIORITY_INTERVAL_MS = 5;

export interface ResolvedPreset {
  readonly preset: GovernorPreset;
  readonly requested: string | undefined;
  /** True when `requested` named no preset and the default was used. */
  readonly fellBack: boolean;
}

export function isGovernorPresetName(value: unknown): value is GovernorPresetName {
  return (
    typeof value === 'string' &&
    GOVERNOR_PRESET_NAMES.some((name) => name === value)
  );
}

/**
 * Looks a preset up by name, ignoring case and surrounding whitespace. A
 * missing or empty name selects the default silently; an unknown one selects
 * it with `fellBack` set.
 */
export function resolvePreset(name: string | undefined): ResolvedPreset {
  const normalized = name?.trim().toLowerCase() ?? '';
  if (normalized.length === 0) {
    return {
      preset: GOVERNOR_PRESETS[DEFAULT_PRESET_NAME],
      requested: name,
      fellBack: false,
    };
  }
  if (isGovernorPresetName(normalized)) {
    return { preset: GOVERNOR_PRESETS[normalized], requested: name, fellBack: false };
  }
  return {
    preset: GOVERNOR_PRESETS[DEFAULT_PRESET_NAME],
    requested: name,
    fellBack: true,
  };
}

/**
 * Expands a preset into configuration overrides. The high-priority interval
 * is half the preset interval (at least 5 ms) and the low-priority interval
 * one and a half times it; the critical interval is left alone.
 */
export function presetToOverrides(preset: GovernorPreset): GovernorConfigOverrides {
  const interval = preset.coalesceIntervalMs;
  return {
    budget: { targetCycleTimeMs: preset.targetCycleTimeMs },
    batch: { baseBatchSize: preset.baseBatchSize },
    coalescer: {
      coalesceIntervalsMs: {
        high: Math.max(MIN_HIGH_PRIORITY_INTERVAL_MS, interval * 0.5),
        medium: interval,
        low: Math.max(interval, interval * 1.5),
      },
    },
  };
}
