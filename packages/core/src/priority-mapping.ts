import { BudgetPriority } from './budget/budget-tracker.js';
import { UpdatePriority } from './batch/update-priority.js';
import { EventPriority } from './events/event-priority.js';

/**
 * Conversions between the per-subsystem priority enums. The batch scheduler
 * counts urgency upward (4 = critical) while the budget tracker and the event
 * coalescer count downward (1 = critical); these are the only places the two
 * conventions meet.
 */

export function updatePriorityToBudgetPriority(
  priority: UpdatePriority,
): BudgetPriority {
  switch (priority) {
    case UpdatePriority.CRITICAL:
      return BudgetPriority.CRITICAL;
    case UpdatePriority.HIGH:
      return BudgetPriority.HIGH;
    case UpdatePriority.MEDIUM:
      return BudgetPriority.MEDIUM;
    case UpdatePriority.LOW:
      return BudgetPriority.LOW;
  }
}

export function budgetPriorityToUpdatePriority(
  priority: BudgetPriority,
): UpdatePriority {
  switch (priority) {
    case BudgetPriority.CRITICAL:
      return UpdatePriority.CRITICAL;
    case BudgetPriority.HIGH:
      return UpdatePriority.HIGH;
    case BudgetPriority.MEDIUM:
      return UpdatePriority.MEDIUM;
    case BudgetPriority.LOW:
      return UpdatePriority.LOW;
  }
}

export function eventPriorityToBudgetPriority(
  priority: EventPriority,
): BudgetPriority {
  switch (priority) {
    case EventPriority.CRITICAL:
      return BudgetPriority.CRITICAL;
    case EventPriority.HIGH:
      return BudgetPriority.HIGH;
    case EventPriority.MEDIUM:
      return BudgetPriority.MEDIUM;
    case EventPriority.LOW:
      return BudgetPriority.LOW;
  }
}
