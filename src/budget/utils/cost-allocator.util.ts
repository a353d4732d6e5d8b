// src/budget/utils/cost-allocator.util.ts

import { BudgetBreakdown } from '../interfaces/budget.interface';
import { BudgetSharePolicy, DEFAULT_BUDGET_SHARE_POLICY } from '../../planning/config/budget-policy.config';

/**
 * Trip budget allocator
 *
 * Splits the total budget into fixed category shares:
 *
 * food        = total × policy.food
 * localTravel = total × policy.localTravel
 * tickets     = total × policy.tickets
 * lodging     = max(total − (food + localTravel + tickets), 0)
 *
 * The caller validates that the budget is positive; a non-positive budget
 * still produces a breakdown, with a lodging budget of 0.
 */
export class CostAllocator {
  static allocate(
    totalBudget: number,
    policy: BudgetSharePolicy = DEFAULT_BUDGET_SHARE_POLICY
  ): BudgetBreakdown {
    const food = totalBudget * policy.food;
    const localTravel = totalBudget * policy.localTravel;
    const tickets = totalBudget * policy.tickets;
    const lodgingBudget = Math.max(totalBudget - (food + localTravel + tickets), 0);

    return Object.freeze({ food, localTravel, tickets, lodgingBudget });
  }

  /**
   * Sum of every bucket in a breakdown
   */
  static total(breakdown: BudgetBreakdown): number {
    return breakdown.food + breakdown.localTravel + breakdown.tickets + breakdown.lodgingBudget;
  }
}
