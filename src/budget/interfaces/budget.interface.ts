// src/budget/interfaces/budget.interface.ts

/**
 * Budget breakdown
 *
 * Derived once per trip request and never mutated afterwards.
 * All amounts are in the budget currency.
 */
export interface BudgetBreakdown {
  readonly food: number;
  readonly localTravel: number;
  readonly tickets: number;
  /** What is left for lodging after the other shares, never below 0 */
  readonly lodgingBudget: number;
}
