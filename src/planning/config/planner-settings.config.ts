// src/planning/config/planner-settings.config.ts

import { ConfigService } from '@nestjs/config';
import { BudgetSharePolicy, DEFAULT_BUDGET_SHARE_POLICY, resolveBudgetSharePolicy } from './budget-policy.config';
import { DEFAULT_PRICE_TIER_TABLE, PriceTierTable, parsePriceTierTable } from './price-tier.config';
import { readNumber } from '../../common/utils/config-value.util';

/** Injection token for {@link PlannerSettings} */
export const PLANNER_SETTINGS = 'PLANNER_SETTINGS';

/**
 * Policy values shared by the budget, lodging and prompt stages
 */
export interface PlannerSettings {
  /** Symbol printed in front of every amount (budget currency) */
  currencySymbol: string;
  budgetShares: BudgetSharePolicy;
  priceTiers: PriceTierTable;
  /** How many shortlisted hotels reach the prompt and the response */
  shortlistSize: number;
  /** Search radius for attractions and lodging (metres) */
  searchRadiusM: number;
}

export const DEFAULT_PLANNER_SETTINGS: Readonly<PlannerSettings> = Object.freeze({
  currencySymbol: '£',
  budgetShares: DEFAULT_BUDGET_SHARE_POLICY,
  priceTiers: DEFAULT_PRICE_TIER_TABLE,
  shortlistSize: 5,
  searchRadiusM: 5000,
});

/**
 * Build planner settings from environment configuration
 */
export function loadPlannerSettings(configService: ConfigService): PlannerSettings {
  return {
    currencySymbol:
      configService.get<string>('PLANNER_CURRENCY_SYMBOL') || DEFAULT_PLANNER_SETTINGS.currencySymbol,
    budgetShares: resolveBudgetSharePolicy({
      food: readNumber(configService, 'BUDGET_FOOD_SHARE'),
      localTravel: readNumber(configService, 'BUDGET_LOCAL_TRAVEL_SHARE'),
      tickets: readNumber(configService, 'BUDGET_TICKETS_SHARE'),
    }),
    priceTiers: parsePriceTierTable(configService.get<string>('LODGING_PRICE_TIERS')),
    shortlistSize: DEFAULT_PLANNER_SETTINGS.shortlistSize,
    searchRadiusM: DEFAULT_PLANNER_SETTINGS.searchRadiusM,
  };
}
