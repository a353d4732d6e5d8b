// src/itinerary/services/itinerary-prompt-builder.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { PLANNER_SETTINGS, PlannerSettings } from '../../planning/config/planner-settings.config';
import { isPriceTier } from '../../planning/config/price-tier.config';
import { BudgetBreakdown } from '../../budget/interfaces/budget.interface';
import {
  ItineraryPrompt,
  ItineraryPromptInput,
  ItineraryPromptRecord,
  PromptHotel,
} from '../interfaces/itinerary-prompt.interface';

export const NO_ATTRACTIONS_TEXT = 'No specific attractions found';
export const LOWEST_TIER_LABEL = 'Inexpensive';
export const ACCOMMODATION_HEADER = 'Consider these accommodation options (sorted by rating, then reviews):';

const RECOMMENDATION_INSTRUCTIONS = [
  'Start the itinerary with a section titled "RECOMMENDED ACCOMMODATION" that lists 1-3 suitable options based on the budget and trip details.',
  "For each accommodation, include the name, approximate price per night, and a brief explanation of why it's recommended (location to attractions, amenities, etc.)",
].join('\n');

/**
 * Whole amounts print as-is, fractional ones with two decimals
 */
export function formatAmount(amount: number): string {
  return Number.isInteger(amount) ? String(amount) : amount.toFixed(2);
}

/**
 * Itinerary prompt builder
 *
 * Composes the generation prompt in this order:
 * 1. trip brief (destination, party, dates, budget, interests, attractions, weather)
 * 2. numbered accommodation list (top N of the shortlist)
 * 3. budget guide, when a breakdown is known
 * 4. "RECOMMENDED ACCOMMODATION" instructions, when hotels were listed
 * 5. the budget ceiling directive (always)
 *
 * Sections are separated by a blank line. Pure string work, no I/O.
 */
@Injectable()
export class ItineraryPromptBuilderService {
  constructor(@Inject(PLANNER_SETTINGS) private readonly settings: PlannerSettings) {}

  build(input: ItineraryPromptInput): ItineraryPrompt {
    const { trip, weather } = input;
    const breakdown = input.breakdown ?? null;
    const tripDuration = input.tripDuration ?? null;
    const listed = input.shortlist.slice(0, this.settings.shortlistSize);

    const attractionsText = input.attractions.length > 0 ? input.attractions.join(', ') : NO_ATTRACTIONS_TEXT;
    const accommodationSection = listed.length > 0 ? this.renderAccommodations(listed, tripDuration) : null;
    const budgetGuide = breakdown ? this.renderBudgetGuide(breakdown) : null;
    const closingDirective =
      `STRICT RULE: Total cost MUST NOT exceed ${this.money(trip.totalBudget)}. ` +
      'Prioritize free/cheap options first.';

    const brief = [
      'You are a helpful tour planner.',
      'Create a day-by-day itinerary, within 1000 words or less,',
      `for a trip to ${trip.destination},`,
      `for ${trip.adults} adults and ${trip.children} children,`,
      `from ${trip.startDate} to ${trip.endDate},`,
      `within a budget of ${this.money(trip.totalBudget)}, and`,
      `with focus on the below interests ${trip.interests.join(', ')}.`,
      `Include places like, ${attractionsText}, in the itinerary and`,
      `factor the forecasted weather, like ${weather} while building the itinerary.`,
    ].join('\n');

    const text = [
      brief,
      accommodationSection,
      budgetGuide,
      listed.length > 0 ? RECOMMENDATION_INSTRUCTIONS : null,
      closingDirective,
    ]
      .filter((section): section is string => section !== null)
      .join('\n\n');

    const record: ItineraryPromptRecord = {
      trip,
      attractionsText,
      weather,
      listedHotels: listed.map((hotel) => hotel.name),
      accommodationSection,
      budgetGuide,
      breakdown,
      tripDuration,
      closingDirective,
    };

    return { text, record };
  }

  /**
   * Price level as repeated currency symbols; tier 0 is "Inexpensive"
   */
  priceGlyph(priceLevel: unknown): string {
    if (!isPriceTier(priceLevel)) {
      return 'Price unknown';
    }
    return priceLevel === 0 ? LOWEST_TIER_LABEL : this.settings.currencySymbol.repeat(priceLevel);
  }

  private renderAccommodations(hotels: PromptHotel[], tripDuration: number | null): string {
    const lines = hotels.map((hotel, index) => {
      const rating =
        hotel.rating === undefined || hotel.rating === null || hotel.rating === '' ? 'Not rated' : String(hotel.rating);
      const vicinity = hotel.vicinity || 'Address not available';

      return (
        `${index + 1}. ${hotel.name} - Rating: ${rating}, Reviews: ${hotel.userRatingsTotal ?? 0}, ` +
        `Price Level: ${this.priceGlyph(hotel.priceLevel)}, Location: ${vicinity}${this.renderCost(hotel, tripDuration)}`
      );
    });

    return [ACCOMMODATION_HEADER, ...lines].join('\n');
  }

  private renderCost(hotel: PromptHotel, tripDuration: number | null): string {
    const nightly = hotel.estimatedNightlyRate;
    const total = hotel.estimatedTotalStayCost;
    if (!nightly || !total || !tripDuration) {
      return '';
    }
    return (
      `, Est. ${this.money(nightly)}/night, ` +
      `Est. total ${this.settings.currencySymbol}${total.toFixed(0)} for ${tripDuration} nights`
    );
  }

  private renderBudgetGuide(breakdown: BudgetBreakdown): string {
    const sym = this.settings.currencySymbol;
    return (
      `Budget guide: lodging budget ≈ ${sym}${breakdown.lodgingBudget.toFixed(0)} ` +
      `after allocating food (${sym}${breakdown.food.toFixed(0)}), ` +
      `local travel (${sym}${breakdown.localTravel.toFixed(0)}), ` +
      `and tickets (${sym}${breakdown.tickets.toFixed(0)}).`
    );
  }

  private money(amount: number): string {
    return `${this.settings.currencySymbol}${formatAmount(amount)}`;
  }
}
