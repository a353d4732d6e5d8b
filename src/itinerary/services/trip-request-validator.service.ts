// src/itinerary/services/trip-request-validator.service.ts
import { BadRequestException, Injectable } from '@nestjs/common';
import { TripPlanningInput } from '../interfaces/trip.interface';
import { parseTripDate } from '../utils/trip-duration.util';

export const VALIDATION_MESSAGES = {
  destination: 'Please enter a destination.',
  coordinates: 'Destination coordinates are out of range.',
  dates: 'Please select start and end dates.',
  dateOrder: 'Start date must be before end date.',
  budget: 'Budget must be greater than zero.',
  interests: 'Please select at least one interest.',
  adults: 'At least one adult is required.',
  children: 'Number of children cannot be negative.',
  rating: 'Minimum accommodation rating must be between 1 and 5.',
  refinement: 'Please enter what you would like to change.',
} as const;

export const INVALID_DESTINATION_MESSAGE = 'Invalid destination. Please enter a valid city.';

/**
 * Rejected trip input, with every problem found
 */
export class TripValidationError extends BadRequestException {
  constructor(readonly errors: string[]) {
    super(errors.join(' '));
  }
}

/**
 * Trip request validator
 *
 * Checks the planning input before anything is looked up and returns all
 * user-facing problems at once (empty list = valid). Whether the destination
 * exists is decided later by geocoding.
 */
@Injectable()
export class TripRequestValidator {
  validate(input: TripPlanningInput): string[] {
    const errors: string[] = [];
    const { destination } = input;

    if (!destination.name?.trim()) {
      errors.push(VALIDATION_MESSAGES.destination);
    }
    if (
      destination.kind === 'point' &&
      (Math.abs(destination.location.lat) > 90 || Math.abs(destination.location.lng) > 180)
    ) {
      errors.push(VALIDATION_MESSAGES.coordinates);
    }

    const start = parseTripDate(input.startDate);
    const end = parseTripDate(input.endDate);
    if (!start || !end) {
      errors.push(VALIDATION_MESSAGES.dates);
    } else if (start.toMillis() > end.toMillis()) {
      errors.push(VALIDATION_MESSAGES.dateOrder);
    }

    if (!Number.isFinite(input.totalBudget) || input.totalBudget <= 0) {
      errors.push(VALIDATION_MESSAGES.budget);
    }
    if (!Array.isArray(input.interests) || !input.interests.some((interest) => interest.trim() !== '')) {
      errors.push(VALIDATION_MESSAGES.interests);
    }
    if (!(input.adults >= 1)) {
      errors.push(VALIDATION_MESSAGES.adults);
    }
    if (!(input.children >= 0)) {
      errors.push(VALIDATION_MESSAGES.children);
    }
    if (!(input.minAccommodationRating >= 1 && input.minAccommodationRating <= 5)) {
      errors.push(VALIDATION_MESSAGES.rating);
    }

    return errors;
  }

  /**
   * Throw a {@link TripValidationError} when the input has problems
   */
  assertValid(input: TripPlanningInput): void {
    const errors = this.validate(input);
    if (errors.length > 0) {
      throw new TripValidationError(errors);
    }
  }
}
