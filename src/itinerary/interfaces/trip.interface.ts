// src/itinerary/interfaces/trip.interface.ts

import { GeoPoint } from '../../providers/geocoding/geocoding.provider.interface';
import { BudgetBreakdown } from '../../budget/interfaces/budget.interface';
import { AccommodationAdvice, ScoredHotel } from '../../hotels/interfaces/lodging.interface';
import { ConversationHistory } from './conversation.interface';
import { ItineraryPrompt } from './itinerary-prompt.interface';

/**
 * Destination as entered: a place name still to be geocoded, or a point the
 * client already resolved
 */
export type DestinationInput =
  | { kind: 'name'; name: string }
  | { kind: 'point'; name: string; location: GeoPoint };

/**
 * Trip parameters before the destination is resolved
 */
export interface TripPlanningInput {
  destination: DestinationInput;
  /** ISO date, YYYY-MM-DD */
  startDate: string;
  endDate: string;
  adults: number;
  children: number;
  totalBudget: number;
  interests: string[];
  /** Preferred accommodation labels; empty means any */
  accommodationTypes: string[];
  /** 1.0 - 5.0 */
  minAccommodationRating: number;
}

/**
 * Trip request with a resolved location
 */
export interface TripRequest extends Omit<TripPlanningInput, 'destination'> {
  destination: string;
  location: GeoPoint;
}

/**
 * Lodging preview for a trip, without the itinerary
 */
export interface LodgingPreview {
  trip: TripRequest;
  breakdown: BudgetBreakdown;
  tripDuration: number;
  /** Best hotels first, at most the configured shortlist size */
  shortlist: ScoredHotel[];
  accommodationAdvice: AccommodationAdvice;
}

export interface TripPlan extends LodgingPreview {
  itinerary: string;
  prompt: ItineraryPrompt;
  /** Seeded with the generated itinerary as the first assistant turn */
  history: ConversationHistory;
}

export interface RefinementResult {
  reply: string;
  history: ConversationHistory;
}
