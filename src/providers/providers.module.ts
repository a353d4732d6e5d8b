// src/providers/providers.module.ts

import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { GEOCODING_PROVIDER, PLACES_PROVIDER, WEATHER_PROVIDER } from './provider.tokens';
import { GeocodingProvider } from './geocoding/geocoding.provider.interface';
import { GoogleGeocodingProvider } from './geocoding/google-geocoding.provider';
import { MockGeocodingProvider } from './geocoding/mock-geocoding.provider';
import { PlacesProvider } from './places/places.provider.interface';
import { GooglePlacesProvider } from './places/google-places.provider';
import { MockPlacesProvider } from './places/mock-places.provider';
import { WeatherProvider } from './weather/weather.provider.interface';
import { OpenWeatherProvider } from './weather/openweather.provider';
import { MockWeatherProvider } from './weather/mock-weather.provider';

const logger = new Logger('ProvidersModule');

function useMockProviders(configService: ConfigService): boolean {
  return configService.get<string>('PROVIDERS_USE_MOCK') === 'true';
}

function googleApiKey(configService: ConfigService): string | undefined {
  return (
    configService.get<string>('GOOGLE_MAPS_API_KEY') ||
    configService.get<string>('GOOGLE_PLACES_API_KEY') ||
    undefined
  );
}

export function createGeocodingProvider(configService: ConfigService): GeocodingProvider {
  const apiKey = googleApiKey(configService);
  if (useMockProviders(configService) || !apiKey) {
    logger.warn('GOOGLE_MAPS_API_KEY not set or PROVIDERS_USE_MOCK=true, using mock geocoder');
    return new MockGeocodingProvider();
  }
  return new GoogleGeocodingProvider(apiKey);
}

export function createPlacesProvider(configService: ConfigService): PlacesProvider {
  const apiKey = googleApiKey(configService);
  if (useMockProviders(configService) || !apiKey) {
    logger.warn('GOOGLE_MAPS_API_KEY not set or PROVIDERS_USE_MOCK=true, using mock places search');
    return new MockPlacesProvider();
  }
  return new GooglePlacesProvider(apiKey);
}

export function createWeatherProvider(configService: ConfigService): WeatherProvider {
  const apiKey = configService.get<string>('OPENWEATHER_API_KEY');
  if (useMockProviders(configService) || !apiKey) {
    logger.warn('OPENWEATHER_API_KEY not set or PROVIDERS_USE_MOCK=true, using mock weather');
    return new MockWeatherProvider();
  }
  return new OpenWeatherProvider(apiKey);
}

/**
 * Lookup providers module
 *
 * Binds the geocoding, places and weather providers. Real providers are used
 * when their API keys are configured:
 *   - GOOGLE_MAPS_API_KEY (or GOOGLE_PLACES_API_KEY): geocoding + places
 *   - OPENWEATHER_API_KEY: weather
 * PROVIDERS_USE_MOCK=true forces the mock providers.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    { provide: GEOCODING_PROVIDER, inject: [ConfigService], useFactory: createGeocodingProvider },
    { provide: PLACES_PROVIDER, inject: [ConfigService], useFactory: createPlacesProvider },
    { provide: WEATHER_PROVIDER, inject: [ConfigService], useFactory: createWeatherProvider },
  ],
  exports: [GEOCODING_PROVIDER, PLACES_PROVIDER, WEATHER_PROVIDER],
})
export class ProvidersModule {}
