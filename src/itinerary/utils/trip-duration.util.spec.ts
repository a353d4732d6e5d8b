// src/itinerary/utils/trip-duration.util.spec.ts

import { TripDurationCalculator, parseTripDate } from './trip-duration.util';

describe('TripDurationCalculator', () => {
  it('should count the days between start and end', () => {
    expect(TripDurationCalculator.calculate('2025-06-01', '2025-06-06')).toBe(5);
    expect(TripDurationCalculator.calculate('2025-12-30', '2026-01-02')).toBe(3);
  });

  it('should count a same-day trip as one night', () => {
    expect(TripDurationCalculator.calculate('2025-06-01', '2025-06-01')).toBe(1);
  });

  it('should fall back to one night for reversed or invalid dates', () => {
    expect(TripDurationCalculator.calculate('2025-06-06', '2025-06-01')).toBe(1);
    expect(TripDurationCalculator.calculate('not-a-date', '2025-06-01')).toBe(1);
    expect(TripDurationCalculator.calculate('', '')).toBe(1);
  });

  it('should cross a daylight saving change without losing a day', () => {
    expect(TripDurationCalculator.calculate('2025-03-29', '2025-04-01')).toBe(3);
  });
});

describe('parseTripDate', () => {
  it('should parse ISO dates and ignore the time of day', () => {
    expect(parseTripDate('2025-06-01T15:30:00')?.toISODate()).toBe('2025-06-01');
  });

  it('should return null for missing or invalid values', () => {
    expect(parseTripDate(undefined)).toBeNull();
    expect(parseTripDate('  ')).toBeNull();
    expect(parseTripDate('2025-13-45')).toBeNull();
  });
});
