import { describe, expect, it } from 'vitest';

import { BudgetPriority } from './budget/budget-tracker.js';
import { UpdatePriority } from './batch/update-priority.js';
import { EventPriority } from './events/event-priority.js';
import {
  budgetPriorityToUpdatePriority,
  eventPriorityToBudgetPriority,
  updatePriorityToBudgetPriority,
} from './priority-mapping.js';

describe('priority mapping', () => {
  it('inverts the numeric order between update and budget priorities', () => {
    expect(updatePriorityToBudgetPriority(UpdatePriority.CRITICAL)).toBe(1);
    expect(updatePriorityToBudgetPriority(UpdatePriority.HIGH)).toBe(2);
    expect(updatePriorityToBudgetPriority(UpdatePriority.MEDIUM)).toBe(3);
    expect(updatePriorityToBudgetPriority(UpdatePriority.LOW)).toBe(4);
  });

  it('round-trips every budget priority through the update convention', () => {
    for (const priority of [
      BudgetPriority.CRITICAL,
      BudgetPriority.HIGH,
      BudgetPriority.MEDIUM,
      BudgetPriority.LOW,
    ]) {
      expect(
        updatePriorityToBudgetPriority(budgetPriorityToUpdatePriority(priority)),
      ).toBe(priority);
    }
    expect(budgetPriorityToUpdatePriority(BudgetPriority.CRITICAL)).toBe(4);
  });

  it('keeps event priorities aligned with budget priorities by name', () => {
    expect(eventPriorityToBudgetPriority(EventPriority.CRITICAL)).toBe(
      BudgetPriority.CRITICAL,
    );
    expect(eventPriorityToBudgetPriority(EventPriority.LOW)).toBe(
      BudgetPriority.LOW,
    );
  });
});
