// src/itinerary/utils/trip-duration.util.ts

import { DateTime } from 'luxon';

/**
 * Parse a YYYY-MM-DD (or any ISO) trip date; null when missing or invalid
 */
export function parseTripDate(value: string | undefined | null): DateTime | null {
  if (!value || !value.trim()) {
    return null;
  }
  const parsed = DateTime.fromISO(value.trim());
  return parsed.isValid ? parsed.startOf('day') : null;
}

/**
 * Trip duration calculator
 *
 * duration = whole days between start and end, at least 1 (a same-day trip
 * still books one night). Unparsable dates give 1.
 */
export class TripDurationCalculator {
  static calculate(startDate: string, endDate: string): number {
    const start = parseTripDate(startDate);
    const end = parseTripDate(endDate);
    if (!start || !end) {
      return 1;
    }

    const days = Math.round(end.diff(start, 'days').days);
    return Math.max(days, 1);
  }
}
