// src/planning/config/budget-policy.config.ts

/**
 * Budget share policy
 *
 * Fractions of the total trip budget set aside for food, local travel and
 * tickets. Whatever is left over funds lodging.
 */
export interface BudgetSharePolicy {
  /** Food share (0-1) */
  food: number;
  /** Local transport share (0-1) */
  localTravel: number;
  /** Attraction tickets share (0-1) */
  tickets: number;
}

export const DEFAULT_BUDGET_SHARE_POLICY: Readonly<BudgetSharePolicy> = Object.freeze({
  food: 0.3,
  localTravel: 0.15,
  tickets: 0.1,
});

/**
 * Merge share overrides onto the default policy.
 *
 * An override is ignored unless it is a finite number in [0, 1], and the
 * whole override set is dropped when the three shares would exceed 1.
 */
export function resolveBudgetSharePolicy(
  overrides: Partial<Record<keyof BudgetSharePolicy, number | undefined>> = {}
): BudgetSharePolicy {
  const pick = (value: number | undefined, fallback: number): number =>
    value !== undefined && Number.isFinite(value) && value >= 0 && value <= 1
      ? value
      : fallback;

  const policy: BudgetSharePolicy = {
    food: pick(overrides.food, DEFAULT_BUDGET_SHARE_POLICY.food),
    localTravel: pick(overrides.localTravel, DEFAULT_BUDGET_SHARE_POLICY.localTravel),
    tickets: pick(overrides.tickets, DEFAULT_BUDGET_SHARE_POLICY.tickets),
  };

  if (policy.food + policy.localTravel + policy.tickets > 1) {
    return { ...DEFAULT_BUDGET_SHARE_POLICY };
  }
  return policy;
}
