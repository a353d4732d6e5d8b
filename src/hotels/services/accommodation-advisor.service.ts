// src/hotels/services/accommodation-advisor.service.ts
import { Injectable } from '@nestjs/common';
import { PlaceCandidate } from '../../providers/places/places.provider.interface';
import { AccommodationAdvice, AccommodationCategory } from '../interfaces/lodging.interface';
import { LodgingScorer } from '../utils/lodging-scorer.util';
import { FALLBACK_PRICE_TIER } from '../../planning/config/price-tier.config';

/**
 * Per-room nightly budget thresholds (budget currency)
 */
export const CATEGORY_THRESHOLDS = {
  luxury: 150,
  midRange: 75,
} as const;

/** Search order per recommended category when its own bucket is empty */
const CATEGORY_FALLBACKS: Record<AccommodationCategory, AccommodationCategory[]> = {
  [AccommodationCategory.BUDGET]: [AccommodationCategory.BUDGET, AccommodationCategory.MID_RANGE, AccommodationCategory.LUXURY],
  [AccommodationCategory.MID_RANGE]: [AccommodationCategory.MID_RANGE, AccommodationCategory.BUDGET, AccommodationCategory.LUXURY],
  [AccommodationCategory.LUXURY]: [AccommodationCategory.LUXURY, AccommodationCategory.MID_RANGE, AccommodationCategory.BUDGET],
};

const MAX_RECOMMENDATIONS = 3;

/**
 * Accommodation advisor
 *
 * Picks a price category from the nightly budget per room and recommends
 * the best rated places of that category. Unlike the hotel selector it never
 * drops a candidate for being over budget; it answers "what class of place
 * fits this trip".
 */
@Injectable()
export class AccommodationAdvisorService {
  advise(
    candidates: PlaceCandidate[],
    params: { lodgingBudget: number; tripDuration: number; totalTravelers: number }
  ): AccommodationAdvice {
    const tripDuration = Math.max(params.tripDuration, 1);
    const roomsNeeded = LodgingScorer.roomsNeeded(params.totalTravelers);
    const budgetPerNight = params.lodgingBudget / tripDuration;
    const budgetPerRoom = budgetPerNight / roomsNeeded;

    const recommendedCategory = this.categorize(budgetPerRoom);
    const buckets = this.bucketByCategory(candidates);

    const fallbackOrder = CATEGORY_FALLBACKS[recommendedCategory];
    const options = fallbackOrder.map((category) => buckets[category]).find((bucket) => bucket.length > 0) ?? [];

    const recommendations = [...options]
      .sort((a, b) => LodgingScorer.parseRating(b.rating) - LodgingScorer.parseRating(a.rating))
      .slice(0, MAX_RECOMMENDATIONS);

    return {
      recommendedCategory,
      recommendations,
      budgetInfo: {
        accommodationBudget: params.lodgingBudget,
        budgetPerNight,
        budgetPerRoom,
        roomsNeeded,
        tripDuration,
      },
    };
  }

  categorize(budgetPerRoom: number): AccommodationCategory {
    if (budgetPerRoom >= CATEGORY_THRESHOLDS.luxury) {
      return AccommodationCategory.LUXURY;
    }
    if (budgetPerRoom >= CATEGORY_THRESHOLDS.midRange) {
      return AccommodationCategory.MID_RANGE;
    }
    return AccommodationCategory.BUDGET;
  }

  private bucketByCategory(candidates: PlaceCandidate[]): Record<AccommodationCategory, PlaceCandidate[]> {
    const buckets: Record<AccommodationCategory, PlaceCandidate[]> = {
      [AccommodationCategory.BUDGET]: [],
      [AccommodationCategory.MID_RANGE]: [],
      [AccommodationCategory.LUXURY]: [],
    };

    for (const candidate of candidates) {
      // places without a price level count as mid-range
      const priceLevel = candidate.priceLevel ?? FALLBACK_PRICE_TIER;
      if (priceLevel <= 1) {
        buckets[AccommodationCategory.BUDGET].push(candidate);
      } else if (priceLevel === 2) {
        buckets[AccommodationCategory.MID_RANGE].push(candidate);
      } else {
        buckets[AccommodationCategory.LUXURY].push(candidate);
      }
    }
    return buckets;
  }
}
