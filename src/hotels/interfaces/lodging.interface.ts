// src/hotels/interfaces/lodging.interface.ts

import { PlaceCandidate } from '../../providers/places/places.provider.interface';
import { BudgetBreakdown } from '../../budget/interfaces/budget.interface';

/**
 * Lodging candidate with cost and rating estimates attached
 */
export interface ScoredHotel extends PlaceCandidate {
  /** Nightly rate derived from the price tier */
  estimatedNightlyRate: number;
  /** nightly rate × rooms × nights */
  estimatedTotalStayCost: number;
  /** ceil(travelers / 2), at least 1 */
  roomsNeeded: number;
  /** Parsed rating, 0 when absent or unparsable */
  ratingValue: number;
}

/**
 * Hotel selection criteria
 */
export interface HotelSelectionCriteria {
  /** Preferred accommodation labels ("Hotel", "Hostel", ...); empty = no filter */
  typePreferences: string[];
  /** Minimum rating (1.0 - 5.0) */
  minRating: number;
  lodgingBudget: number;
  tripDuration: number;
  totalTravelers: number;
  /** Breakdown the lodging budget came from, echoed back in the result */
  breakdown?: BudgetBreakdown;
}

/**
 * Hotel selection result
 *
 * Carries the numbers that produced the shortlist so the prompt can cite them.
 */
export interface HotelSelectionResult {
  /** Every surviving candidate, best first */
  shortlist: ScoredHotel[];
  breakdown: BudgetBreakdown | null;
  tripDuration: number;
}

/**
 * Accommodation price categories
 */
export enum AccommodationCategory {
  BUDGET = 'budget',
  MID_RANGE = 'mid_range',
  LUXURY = 'luxury',
}

/**
 * Accommodation advice
 */
export interface AccommodationAdvice {
  recommendedCategory: AccommodationCategory;
  /** Top options from the recommended category (or its fallback) */
  recommendations: PlaceCandidate[];
  budgetInfo: {
    accommodationBudget: number;
    budgetPerNight: number;
    budgetPerRoom: number;
    roomsNeeded: number;
    tripDuration: number;
  };
}
