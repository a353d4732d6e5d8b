// src/providers/weather/mock-weather.provider.ts

import { GeoPoint } from '../geocoding/geocoding.provider.interface';
import { WeatherProvider } from './weather.provider.interface';

/**
 * Mock weather provider (development and tests)
 */
export class MockWeatherProvider implements WeatherProvider {
  constructor(private readonly description = 'clear sky') {}

  async describe(_location: GeoPoint): Promise<string> {
    return this.description;
  }
}
