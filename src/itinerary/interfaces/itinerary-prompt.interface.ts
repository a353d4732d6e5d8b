// src/itinerary/interfaces/itinerary-prompt.interface.ts

import { PlaceCandidate } from '../../providers/places/places.provider.interface';
import { ScoredHotel } from '../../hotels/interfaces/lodging.interface';
import { BudgetBreakdown } from '../../budget/interfaces/budget.interface';
import { TripRequest } from './trip.interface';

/**
 * Hotel as the prompt sees it; cost estimates are optional
 */
export type PromptHotel = PlaceCandidate &
  Partial<Pick<ScoredHotel, 'estimatedNightlyRate' | 'estimatedTotalStayCost'>>;

export interface ItineraryPromptInput {
  trip: TripRequest;
  /** Attraction names */
  attractions: string[];
  weather: string;
  shortlist: PromptHotel[];
  breakdown?: BudgetBreakdown | null;
  tripDuration?: number | null;
}

/**
 * What went into a prompt, kept next to the text for auditing
 */
export interface ItineraryPromptRecord {
  trip: TripRequest;
  attractionsText: string;
  weather: string;
  /** Names of the hotels listed in the prompt, in order */
  listedHotels: string[];
  accommodationSection: string | null;
  budgetGuide: string | null;
  breakdown: BudgetBreakdown | null;
  tripDuration: number | null;
  closingDirective: string;
}

export interface ItineraryPrompt {
  text: string;
  record: ItineraryPromptRecord;
}
