// src/itinerary/services/itinerary-planner.service.ts
import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { GEOCODING_PROVIDER, PLACES_PROVIDER, WEATHER_PROVIDER } from '../../providers/provider.tokens';
import { GeocodingProvider, GeoPoint } from '../../providers/geocoding/geocoding.provider.interface';
import { PlaceCandidate, PlaceCategory, PlacesProvider } from '../../providers/places/places.provider.interface';
import { WEATHER_NOT_AVAILABLE, WeatherProvider } from '../../providers/weather/weather.provider.interface';
import { PLANNER_SETTINGS, PlannerSettings } from '../../planning/config/planner-settings.config';
import { CostAllocator } from '../../budget/utils/cost-allocator.util';
import { BudgetBreakdown } from '../../budget/interfaces/budget.interface';
import { HotelSelectorService } from '../../hotels/services/hotel-selector.service';
import { AccommodationAdvisorService } from '../../hotels/services/accommodation-advisor.service';
import { LlmService } from '../../llm/services/llm.service';
import { extractErrorMessage } from '../../common/utils/error-message.util';
import { ItineraryPromptBuilderService } from './itinerary-prompt-builder.service';
import { INVALID_DESTINATION_MESSAGE, TripRequestValidator, VALIDATION_MESSAGES } from './trip-request-validator.service';
import { TripDurationCalculator } from '../utils/trip-duration.util';
import { RefinementFormatter } from '../utils/refinement-formatter.util';
import { ConversationHistory } from '../interfaces/conversation.interface';
import {
  DestinationInput,
  LodgingPreview,
  RefinementResult,
  TripPlan,
  TripPlanningInput,
  TripRequest,
} from '../interfaces/trip.interface';

export const REFINEMENT_SYSTEM_PROMPT =
  "You are a helpful travel planning assistant. Refine the itinerary based on the user's requests and the previous conversation history.";

/**
 * Itinerary planner
 *
 * Runs one planning request end to end:
 * validate → resolve destination → look up attractions, weather and lodging →
 * allocate budget → select hotels → advise category → build prompt → generate.
 *
 * Lookup failures degrade to placeholders (no attractions, weather sentinel,
 * no lodging) instead of failing the request. Only an invalid request or an
 * unknown destination is an error.
 */
@Injectable()
export class ItineraryPlannerService {
  private readonly logger = new Logger(ItineraryPlannerService.name);

  constructor(
    @Inject(GEOCODING_PROVIDER) private readonly geocoder: GeocodingProvider,
    @Inject(PLACES_PROVIDER) private readonly places: PlacesProvider,
    @Inject(WEATHER_PROVIDER) private readonly weather: WeatherProvider,
    @Inject(PLANNER_SETTINGS) private readonly settings: PlannerSettings,
    private readonly validator: TripRequestValidator,
    private readonly hotelSelector: HotelSelectorService,
    private readonly accommodationAdvisor: AccommodationAdvisorService,
    private readonly promptBuilder: ItineraryPromptBuilderService,
    private readonly llmService: LlmService,
  ) {}

  /**
   * Budget allocation for a total budget
   */
  previewBudget(totalBudget: number): BudgetBreakdown {
    return CostAllocator.allocate(totalBudget, this.settings.budgetShares);
  }

  /**
   * Shortlist and category advice for a trip, without generating an itinerary
   */
  async previewLodging(input: TripPlanningInput): Promise<LodgingPreview> {
    this.validator.assertValid(input);
    const trip = await this.resolveTrip(input);
    const lodging = await this.searchPlaces(trip.location, 'lodging');
    return this.assessLodging(trip, lodging);
  }

  /**
   * Generate the initial itinerary
   */
  async plan(input: TripPlanningInput): Promise<TripPlan> {
    this.validator.assertValid(input);
    const trip = await this.resolveTrip(input);

    const [attractions, weather, lodging] = await Promise.all([
      this.searchPlaces(trip.location, 'attraction'),
      this.describeWeather(trip.location),
      this.searchPlaces(trip.location, 'lodging'),
    ]);

    const preview = this.assessLodging(trip, lodging);
    const prompt = this.promptBuilder.build({
      trip,
      attractions: attractions.map((place) => place.name),
      weather,
      shortlist: preview.shortlist,
      breakdown: preview.breakdown,
      tripDuration: preview.tripDuration,
    });

    const itinerary = await this.llmService.generate([{ role: 'user', content: prompt.text }]);
    this.logger.log(
      `Planned ${preview.tripDuration}-night trip to ${trip.destination} ` +
        `(${attractions.length} attractions, ${preview.shortlist.length} shortlisted hotels)`
    );

    return {
      ...preview,
      itinerary,
      prompt,
      history: RefinementFormatter.append([], 'assistant', itinerary),
    };
  }

  /**
   * Refine an itinerary with a follow-up request
   *
   * The request is appended to the history first, so the transcript the model
   * sees ends with it; the reply is appended to the returned history.
   */
  async refine(history: ConversationHistory, userInput: string): Promise<RefinementResult> {
    const request = userInput.trim();
    if (!request) {
      throw new BadRequestException(VALIDATION_MESSAGES.refinement);
    }

    const withRequest = RefinementFormatter.append(history, 'user', request);
    const reply = await this.llmService.generate([
      { role: 'system', content: REFINEMENT_SYSTEM_PROMPT },
      { role: 'assistant', content: RefinementFormatter.format(withRequest) },
      { role: 'user', content: request },
    ]);

    return {
      reply,
      history: RefinementFormatter.append(withRequest, 'assistant', reply),
    };
  }

  private assessLodging(trip: TripRequest, lodging: PlaceCandidate[]): LodgingPreview {
    const tripDuration = TripDurationCalculator.calculate(trip.startDate, trip.endDate);
    const breakdown = this.previewBudget(trip.totalBudget);
    const totalTravelers = trip.adults + trip.children;

    const selection = this.hotelSelector.select(lodging, {
      typePreferences: trip.accommodationTypes,
      minRating: trip.minAccommodationRating,
      lodgingBudget: breakdown.lodgingBudget,
      tripDuration,
      totalTravelers,
      breakdown,
    });
    const accommodationAdvice = this.accommodationAdvisor.advise(lodging, {
      lodgingBudget: breakdown.lodgingBudget,
      tripDuration,
      totalTravelers,
    });

    return {
      trip,
      breakdown,
      tripDuration,
      shortlist: selection.shortlist.slice(0, this.settings.shortlistSize),
      accommodationAdvice,
    };
  }

  private async resolveTrip(input: TripPlanningInput): Promise<TripRequest> {
    const { destination, ...rest } = input;
    const location = await this.resolveDestination(destination);
    return { ...rest, destination: destination.name.trim(), location };
  }

  private async resolveDestination(destination: DestinationInput): Promise<GeoPoint> {
    if (destination.kind === 'point') {
      return destination.location;
    }

    let location: GeoPoint | null;
    try {
      location = await this.geocoder.geocode(destination.name.trim());
    } catch (error) {
      this.logger.warn(`Geocoding "${destination.name}" failed: ${extractErrorMessage(error)}`);
      location = null;
    }

    if (!location) {
      throw new NotFoundException(INVALID_DESTINATION_MESSAGE);
    }
    return location;
  }

  private searchPlaces(location: GeoPoint, category: PlaceCategory): Promise<PlaceCandidate[]> {
    return this.withFallback(
      () => this.places.nearby({ location, category, radiusM: this.settings.searchRadiusM }),
      [],
      `Failed to search ${category} places`
    );
  }

  private describeWeather(location: GeoPoint): Promise<string> {
    return this.withFallback(() => this.weather.describe(location), WEATHER_NOT_AVAILABLE, 'Failed to fetch weather');
  }

  private async withFallback<T>(task: () => Promise<T>, fallback: T, context: string): Promise<T> {
    try {
      return await task();
    } catch (error) {
      this.logger.warn(`${context}: ${extractErrorMessage(error)}`);
      return fallback;
    }
  }
}
