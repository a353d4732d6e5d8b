// src/itinerary/utils/trip-input.mapper.ts

import { PlanTripDto } from '../dto/plan-trip.dto';
import { DestinationInput, TripPlanningInput } from '../interfaces/trip.interface';

export const DEFAULT_MIN_ACCOMMODATION_RATING = 3;

/**
 * Request DTO -> planning input
 *
 * A destination with both coordinates becomes a point; otherwise it is a
 * name to geocode.
 */
export function toPlanningInput(dto: PlanTripDto): TripPlanningInput {
  const name = dto.destination;
  const destination: DestinationInput =
    dto.lat !== undefined && dto.lng !== undefined
      ? { kind: 'point', name, location: { lat: dto.lat, lng: dto.lng } }
      : { kind: 'name', name };

  return {
    destination,
    startDate: dto.startDate,
    endDate: dto.endDate,
    adults: dto.adults,
    children: dto.children ?? 0,
    totalBudget: dto.totalBudget,
    interests: dto.interests,
    accommodationTypes: dto.accommodationTypes ?? [],
    minAccommodationRating: dto.minAccommodationRating ?? DEFAULT_MIN_ACCOMMODATION_RATING,
  };
}
