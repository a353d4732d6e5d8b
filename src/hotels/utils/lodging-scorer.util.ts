// src/hotels/utils/lodging-scorer.util.ts

import { PlaceCandidate } from '../../providers/places/places.provider.interface';
import { ScoredHotel } from '../interfaces/lodging.interface';
import {
  DEFAULT_PRICE_TIER_TABLE,
  FALLBACK_PRICE_TIER,
  PriceTierTable,
  isPriceTier,
} from '../../planning/config/price-tier.config';

/**
 * Lodging cost scorer
 *
 * Places lookups give no room prices, so the stay cost is estimated from the
 * price tier:
 *
 * total stay cost = nightly rate(tier) × rooms needed × nights
 *
 * Rooms assume two travelers per room.
 */
export class LodgingScorer {
  /**
   * Score a raw candidate
   *
   * @param roomsNeeded rooms for the whole party
   * @param tripDuration nights
   * @param tierTable tier -> nightly rate, defaults to {@link DEFAULT_PRICE_TIER_TABLE}
   */
  static score(
    candidate: PlaceCandidate,
    roomsNeeded: number,
    tripDuration: number,
    tierTable: PriceTierTable = DEFAULT_PRICE_TIER_TABLE
  ): ScoredHotel {
    const estimatedNightlyRate = this.nightlyRate(candidate.priceLevel, tierTable);

    return {
      ...candidate,
      estimatedNightlyRate,
      estimatedTotalStayCost: estimatedNightlyRate * roomsNeeded * tripDuration,
      roomsNeeded,
      ratingValue: this.parseRating(candidate.rating),
    };
  }

  /**
   * Nightly rate for a price tier; unknown or missing tiers use the tier-2 rate
   */
  static nightlyRate(priceLevel: unknown, tierTable: PriceTierTable = DEFAULT_PRICE_TIER_TABLE): number {
    return isPriceTier(priceLevel) ? tierTable[priceLevel] : tierTable[FALLBACK_PRICE_TIER];
  }

  /**
   * Numeric rating, 0 when absent or not a number
   */
  static parseRating(rating: unknown): number {
    if (typeof rating === 'number') {
      return Number.isFinite(rating) ? rating : 0;
    }
    if (typeof rating === 'string' && rating.trim() !== '') {
      const value = Number(rating.trim());
      return Number.isFinite(value) ? value : 0;
    }
    return 0;
  }

  /**
   * Rooms for a party, two travelers per room, at least one room
   */
  static roomsNeeded(totalTravelers: number): number {
    return Math.max(Math.ceil(totalTravelers / 2), 1);
  }
}
