// src/itinerary/services/trip-request-validator.service.spec.ts

import { BadRequestException } from '@nestjs/common';
import {
  TripRequestValidator,
  TripValidationError,
  VALIDATION_MESSAGES,
} from './trip-request-validator.service';
import { TripPlanningInput } from '../interfaces/trip.interface';
import { PlanTripDto } from '../dto/plan-trip.dto';
import { toPlanningInput } from '../utils/trip-input.mapper';

describe('TripRequestValidator', () => {
  const validator = new TripRequestValidator();

  const input = (overrides: Partial<TripPlanningInput> = {}): TripPlanningInput => ({
    destination: { kind: 'name', name: 'Rome' },
    startDate: '2025-09-10',
    endDate: '2025-09-14',
    adults: 2,
    children: 0,
    totalBudget: 1500,
    interests: ['Art'],
    accommodationTypes: [],
    minAccommodationRating: 3,
    ...overrides,
  });

  it('should accept a complete request', () => {
    expect(validator.validate(input())).toEqual([]);
  });

  it('should accept a same-day trip', () => {
    expect(validator.validate(input({ endDate: '2025-09-10' }))).toEqual([]);
  });

  it('should report every problem at once, in form order', () => {
    const errors = validator.validate(
      input({
        destination: { kind: 'name', name: '   ' },
        startDate: '',
        totalBudget: 0,
        interests: [],
      })
    );

    expect(errors).toEqual([
      VALIDATION_MESSAGES.destination,
      VALIDATION_MESSAGES.dates,
      VALIDATION_MESSAGES.budget,
      VALIDATION_MESSAGES.interests,
    ]);
  });

  it('should reject an end date before the start date', () => {
    expect(validator.validate(input({ startDate: '2025-09-14', endDate: '2025-09-10' }))).toEqual([
      'Start date must be before end date.',
    ]);
  });

  it('should reject a party without adults and negative children', () => {
    expect(validator.validate(input({ adults: 0, children: -1 }))).toEqual([
      'At least one adult is required.',
      'Number of children cannot be negative.',
    ]);
  });

  it('should reject ratings outside 1-5 and blank interests', () => {
    expect(validator.validate(input({ minAccommodationRating: 5.5, interests: [' '] }))).toEqual([
      'Please select at least one interest.',
      'Minimum accommodation rating must be between 1 and 5.',
    ]);
  });

  it('should reject out-of-range coordinates', () => {
    const destination = { kind: 'point' as const, name: 'Nowhere', location: { lat: 91, lng: 0 } };
    expect(validator.validate(input({ destination }))).toEqual([VALIDATION_MESSAGES.coordinates]);
  });

  it('should report a request body missing its destination and interests', () => {
    const dto = Object.assign(new PlanTripDto(), {
      startDate: '2025-09-10',
      endDate: '2025-09-14',
      adults: 2,
      totalBudget: 1500,
    });

    expect(validator.validate(toPlanningInput(dto))).toEqual([
      VALIDATION_MESSAGES.destination,
      VALIDATION_MESSAGES.interests,
    ]);
  });

  describe('assertValid', () => {
    it('should throw a bad request carrying all messages', () => {
      let thrown: unknown;
      try {
        validator.assertValid(input({ totalBudget: -5, interests: [] }));
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(TripValidationError);
      expect(thrown).toBeInstanceOf(BadRequestException);
      if (thrown instanceof TripValidationError) {
        expect(thrown.errors).toEqual(['Budget must be greater than zero.', 'Please select at least one interest.']);
        expect(thrown.message).toBe('Budget must be greater than zero. Please select at least one interest.');
      }
    });

    it('should not throw for a valid request', () => {
      expect(() => validator.assertValid(input())).not.toThrow();
    });
  });
});
