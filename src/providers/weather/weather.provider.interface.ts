// src/providers/weather/weather.provider.interface.ts

import { GeoPoint } from '../geocoding/geocoding.provider.interface';

/** Returned whenever no weather description can be obtained */
export const WEATHER_NOT_AVAILABLE = 'Weather data not available';

/**
 * Weather provider
 *
 * Produces a short description (e.g. "light rain") for a location.
 */
export interface WeatherProvider {
  describe(location: GeoPoint): Promise<string>;
}
