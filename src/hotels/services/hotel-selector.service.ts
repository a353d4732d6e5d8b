// src/hotels/services/hotel-selector.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { PlaceCandidate } from '../../providers/places/places.provider.interface';
import { HotelSelectionCriteria, HotelSelectionResult, ScoredHotel } from '../interfaces/lodging.interface';
import { LodgingScorer } from '../utils/lodging-scorer.util';
import { PLANNER_SETTINGS, PlannerSettings } from '../../planning/config/planner-settings.config';

/** Tag that every lodging place carries; it satisfies any type preference */
const GENERIC_LODGING_TAG = 'lodging';

/**
 * Preference label -> place type tags
 */
const ACCOMMODATION_TYPE_TAGS: Partial<Record<string, string[]>> = {
  hotel: ['hotel'],
  hostel: ['hostel'],
  apartment: ['apartment', 'apartment_hotel', 'apartment_complex'],
  guesthouse: ['guest_house', 'guesthouse', 'bed_and_breakfast'],
  resort: ['resort_hotel', 'resort'],
};

/**
 * Hotel selector
 *
 * Filters lodging candidates by rating, type and affordability, then ranks
 * the survivors:
 * 1. rating (descending)
 * 2. review count (descending)
 *
 * The whole ranked list is returned; presentation truncates it.
 */
@Injectable()
export class HotelSelectorService {
  private readonly logger = new Logger(HotelSelectorService.name);

  constructor(@Inject(PLANNER_SETTINGS) private readonly settings: PlannerSettings) {}

  select(candidates: PlaceCandidate[], criteria: HotelSelectionCriteria): HotelSelectionResult {
    const { minRating, lodgingBudget, tripDuration, totalTravelers } = criteria;
    const breakdown = criteria.breakdown ?? null;
    const roomsNeeded = LodgingScorer.roomsNeeded(totalTravelers);

    if (lodgingBudget <= 0) {
      this.logger.debug('Lodging budget is exhausted, no candidates can be afforded');
      return { shortlist: [], breakdown, tripDuration };
    }

    const preferredTags = this.resolvePreferredTags(criteria.typePreferences);

    const shortlist = candidates
      .map((candidate) => LodgingScorer.score(candidate, roomsNeeded, tripDuration, this.settings.priceTiers))
      .filter(
        (hotel) =>
          hotel.ratingValue >= minRating &&
          this.matchesType(hotel, preferredTags) &&
          hotel.estimatedTotalStayCost <= lodgingBudget
      )
      .sort(compareHotels);

    this.logger.debug(
      `Selected ${shortlist.length}/${candidates.length} lodging candidates ` +
        `(budget ${lodgingBudget.toFixed(0)}, ${roomsNeeded} room(s), ${tripDuration} night(s))`
    );

    return { shortlist, breakdown, tripDuration };
  }

  /**
   * Expand preference labels into the tag set they accept
   */
  private resolvePreferredTags(typePreferences: string[]): Set<string> {
    const tags = new Set<string>();
    for (const label of typePreferences) {
      const normalized = label.trim().toLowerCase();
      if (!normalized) {
        continue;
      }
      const mapped = ACCOMMODATION_TYPE_TAGS[normalized] ?? [normalized.replace(/\s+/g, '_')];
      mapped.forEach((tag) => tags.add(tag));
    }
    return tags;
  }

  private matchesType(hotel: ScoredHotel, preferredTags: Set<string>): boolean {
    if (preferredTags.size === 0) {
      return true;
    }
    return hotel.types.some((tag) => {
      const normalized = tag.toLowerCase();
      return normalized === GENERIC_LODGING_TAG || preferredTags.has(normalized);
    });
  }
}

function compareHotels(a: ScoredHotel, b: ScoredHotel): number {
  return b.ratingValue - a.ratingValue || (b.userRatingsTotal ?? 0) - (a.userRatingsTotal ?? 0);
}
