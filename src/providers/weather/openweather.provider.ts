// src/providers/weather/openweather.provider.ts

import { BaseProvider } from '../base.provider';
import { HttpClientFactory } from '../../common/utils/http-client.factory';
import { GeoPoint } from '../geocoding/geocoding.provider.interface';
import { WEATHER_NOT_AVAILABLE, WeatherProvider } from './weather.provider.interface';

interface OpenWeatherCurrentResponse {
  weather?: Array<{ main?: string; description?: string }>;
}

/**
 * OpenWeather current weather provider
 *
 * Falls back to {@link WEATHER_NOT_AVAILABLE} when the API fails or has no
 * description for the location.
 */
export class OpenWeatherProvider extends BaseProvider implements WeatherProvider {
  constructor(apiKey: string) {
    super(OpenWeatherProvider.name, {
      baseURL: 'https://api.openweathermap.org/data/2.5',
      timeout: 10000,
    });
    this.httpClient = HttpClientFactory.createWithApiKey(apiKey, {
      baseURL: 'https://api.openweathermap.org/data/2.5',
      timeout: 10000,
      paramName: 'appid',
      additionalParams: { units: 'metric' },
    });
  }

  async describe(location: GeoPoint): Promise<string> {
    return this.safeRequest(
      async () => {
        const response = await this.httpClient.get<OpenWeatherCurrentResponse>('/weather', {
          params: { lat: location.lat, lon: location.lng },
        });
        return response.data.weather?.[0]?.description || WEATHER_NOT_AVAILABLE;
      },
      'Failed to fetch weather',
      WEATHER_NOT_AVAILABLE
    );
  }
}
