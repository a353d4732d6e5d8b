// src/planning/config/price-tier.config.ts

/**
 * Price tier -> nightly rate policy
 *
 * Places lookups only expose an ordinal price level (0-4), never a real room
 * price. The table below turns that ordinal into an estimated nightly rate in
 * the budget currency. Swap it for a pricing feed by providing another table.
 */
export type PriceTier = 0 | 1 | 2 | 3 | 4;

export type PriceTierTable = Readonly<Record<PriceTier, number>>;

export const PRICE_TIERS: readonly PriceTier[] = [0, 1, 2, 3, 4];

export const DEFAULT_PRICE_TIER_TABLE: PriceTierTable = Object.freeze({
  0: 50,
  1: 75,
  2: 120,
  3: 200,
  4: 320,
});

/** Tier used when a place has no (or an unknown) price level */
export const FALLBACK_PRICE_TIER: PriceTier = 2;

export function isPriceTier(value: unknown): value is PriceTier {
  return typeof value === 'number' && PRICE_TIERS.some((tier) => tier === value);
}

/**
 * Parse a "50,75,120,200,320" style override.
 *
 * Returns the default table unless exactly five positive numbers are given.
 */
export function parsePriceTierTable(raw: string | undefined): PriceTierTable {
  if (!raw || !raw.trim()) {
    return DEFAULT_PRICE_TIER_TABLE;
  }

  const rates = raw.split(',').map((part) => Number(part.trim()));
  if (rates.length !== PRICE_TIERS.length || rates.some((rate) => !Number.isFinite(rate) || rate <= 0)) {
    return DEFAULT_PRICE_TIER_TABLE;
  }

  const [tier0, tier1, tier2, tier3, tier4] = rates;
  return Object.freeze({ 0: tier0, 1: tier1, 2: tier2, 3: tier3, 4: tier4 });
}
