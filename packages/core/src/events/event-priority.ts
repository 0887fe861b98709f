/**
 * Urgency levels for coalesced and queued events. Lower values are more
 * urgent: `CRITICAL` (1) bypasses coalescing entirely and `LOW` (4) waits the
 * longest. Same direction as the budget tracker's levels, opposite to
 * `UpdatePriority`.
 */
export enum EventPriority {
  CRITICAL = 1,
  HIGH = 2,
  MEDIUM = 3,
  LOW = 4,
}

export const DEFAULT_EVENT_PRIORITY = EventPriority.MEDIUM;

export function clampEventPriority(value: unknown): EventPriority {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return DEFAULT_EVENT_PRIORITY;
  }
  const rounded = Math.round(value);
  if (rounded <= EventPriority.CRITICAL) {
    return EventPriority.CRITICAL;
  }
  if (rounded === EventPriority.HIGH) {
    return EventPriority.HIGH;
  }
  if (rounded === EventPriority.MEDIUM) {
    return EventPriority.MEDIUM;
  }
  return EventPriority.LOW;
}
