import { z } from 'zod';

import { GOVERNOR_PRESET_NAMES } from './presets.js';

const FINITE_NUMBER_MESSAGE = 'Value must be a finite number.';
const POSITIVE_NUMBER_MESSAGE = 'Value must be greater than 0.';
const NONNEGATIVE_NUMBER_MESSAGE = 'Value must be greater than or equal to 0.';
const POSITIVE_INTEGER_MESSAGE = 'Value must be a positive integer greater than 0.';
const BATCH_SIZE_MESSAGE = 'Batch size must be at least 2.';

const ensureFinite = (value: number, ctx: z.RefinementCtx) => {
  if (!Number.isFinite(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: FINITE_NUMBER_MESSAGE,
    });
    return z.NEVER;
  }

  return value;
};

const finiteNumberSchema = z.coerce
  .number()
  .transform((value, ctx) => ensureFinite(value, ctx));

const positiveNumberSchema = finiteNumberSchema.refine((value) => value > 0, {
  message: POSITIVE_NUMBER_MESSAGE,
});

const nonnegativeNumberSchema = finiteNumberSchema.refine((value) => value >= 0, {
  message: NONNEGATIVE_NUMBER_MESSAGE,
});

const positiveIntSchema = finiteNumberSchema
  .refine(Number.isInteger, { message: POSITIVE_INTEGER_MESSAGE })
  .refine((value) => value > 0, { message: POSITIVE_INTEGER_MESSAGE });

export const presetNameSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(GOVERNOR_PRESET_NAMES));

const budgetOverridesSchema = z
  .object({
    targetCycleTimeMs: positiveNumberSchema.optional(),
    sampleCapacity: positiveIntSchema.optional(),
    percentileIntervalCycles: positiveIntSchema.optional(),
    maxDeferredPerPriority: positiveIntSchema.optional(),
    maxDeferredDrainPerCycle: positiveIntSchema.optional(),
  })
  .strict();

const batchOverridesSchema = z
  .object({
    baseBatchSize: positiveIntSchema
      .refine((value) => value >= 2, { message: BATCH_SIZE_MESSAGE })
      .optional(),
    decayIntervalMs: positiveNumberSchema.optional(),
  })
  .strict();

const coalescerOverridesSchema = z
  .object({
    coalesceIntervalsMs: z
      .object({
        critical: nonnegativeNumberSchema.optional(),
        high: nonnegativeNumberSchema.optional(),
        medium: nonnegativeNumberSchema.optional(),
        low: nonnegativeNumberSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const busOverridesSchema = z
  .object({
    slowHandlerThresholdMs: nonnegativeNumberSchema.optional(),
  })
  .strict();

export const governorOverridesSchema = z
  .object({
    budget: budgetOverridesSchema.optional(),
    batch: batchOverridesSchema.optional(),
    coalescer: coalescerOverridesSchema.optional(),
    bus: busOverridesSchema.optional(),
  })
  .strict();

/**
 * Settings document a host may load from disk or receive from a user:
 * an optional preset, an enabled flag and configuration overrides that are
 * layered on top of the preset.
 */
export const governorSettingsSchema = z
  .object({
    preset: presetNameSchema.optional(),
    enabled: z.boolean().optional(),
    overrides: governorOverridesSchema.optional(),
  })
  .strict();

export type GovernorSettingsInput = z.input<typeof governorSettingsSchema>;
export type GovernorSettings = z.output<typeof governorSettingsSchema>;

export class GovernorSettingsError extends Error {
  constructor(
    message: string,
    readonly issues: readonly z.ZodIssue[],
  ) {
    super(message);
    this.name = 'GovernorSettingsError';
  }
}

export type GovernorSettingsParseResult =
  | { readonly success: true; readonly settings: GovernorSettings }
  | { readonly success: false; readonly error: GovernorSettingsError };

export function safeParseGovernorSettings(input: unknown): GovernorSettingsParseResult {
  const result = governorSettingsSchema.safeParse(input);
  if (result.success) {
    return { success: true, settings: result.data };
  }
  return {
    success: false,
    error: new GovernorSettingsError(
      formatIssues(result.error.issues),
      result.error.issues,
    ),
  };
}

/**
 * Validates a settings document and throws {@link GovernorSettingsError}
 * listing every issue when it is malformed.
 */
export function parseGovernorSettings(input: unknown): GovernorSettings {
  const result = safeParseGovernorSettings(input);
  if (!result.success) {
    throw result.error;
  }
  return result.settings;
}

function formatIssues(issues: readonly z.ZodIssue[]): string {
  const details = issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  return `Invalid governor settings: ${details.join('; ')}`;
}
