/**
 * Urgency levels for pending update targets. Higher values are more urgent:
 * `CRITICAL` (4) drains first and `LOW` (1) last. This is the reverse of
 * `BudgetPriority`; translate with `updatePriorityToBudgetPriority`
 * before consulting the budget tracker.
 */
export enum UpdatePriority {
  LOW = 1,
  MEDIUM = 2,
  HIGH = 3,
  CRITICAL = 4,
}

/** Most urgent first. */
export const UPDATE_PRIORITY_ORDER: readonly UpdatePriority[] = Object.freeze([
  UpdatePriority.CRITICAL,
  UpdatePriority.HIGH,
  UpdatePriority.MEDIUM,
  UpdatePriority.LOW,
]);

export const DEFAULT_UPDATE_PRIORITY = UpdatePriority.MEDIUM;

/**
 * Maps any numeric input onto the closest update priority. Non-numeric input
 * resolves to {@link DEFAULT_UPDATE_PRIORITY}.
 */
export function clampUpdatePriority(value: unknown): UpdatePriority {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return DEFAULT_UPDATE_PRIORITY;
  }
  const rounded = Math.round(value);
  if (rounded <= UpdatePriority.LOW) {
    return UpdatePriority.LOW;
  }
  if (rounded === UpdatePriority.MEDIUM) {
    return UpdatePriority.MEDIUM;
  }
  if (rounded === UpdatePriority.HIGH) {
    return UpdatePriority.HIGH;
  }
  return UpdatePriority.CRITICAL;
}
