// src/providers/geocoding/google-geocoding.provider.ts

import { BaseProvider } from '../base.provider';
import { HttpClientFactory } from '../../common/utils/http-client.factory';
import { GeocodingProvider, GeoPoint } from './geocoding.provider.interface';

interface GoogleGeocodeResponse {
  status: string;
  error_message?: string;
  results?: Array<{
    formatted_address?: string;
    geometry?: { location?: { lat?: number; lng?: number } };
  }>;
}

/**
 * Google Geocoding API provider
 *
 * API docs: https://developers.google.com/maps/documentation/geocoding/requests-geocoding
 */
export class GoogleGeocodingProvider extends BaseProvider implements GeocodingProvider {
  constructor(apiKey: string) {
    super(GoogleGeocodingProvider.name, {
      baseURL: 'https://maps.googleapis.com/maps/api',
      timeout: 10000,
    });
    this.httpClient = HttpClientFactory.createWithApiKey(apiKey, {
      baseURL: 'https://maps.googleapis.com/maps/api',
      timeout: 10000,
      paramName: 'key',
      additionalParams: { language: 'en' },
    });
  }

  async geocode(address: string): Promise<GeoPoint | null> {
    const response = await this.httpClient.get<GoogleGeocodeResponse>('/geocode/json', {
      params: { address },
    });
    const data = response.data;

    if (data.status === 'ZERO_RESULTS') {
      this.logger.debug(`No geocoding result for "${address}"`);
      return null;
    }
    if (data.status !== 'OK') {
      throw new Error(`Google Geocoding API returned status: ${data.status}${data.error_message ? ` (${data.error_message})` : ''}`);
    }

    const location = data.results?.[0]?.geometry?.location;
    if (typeof location?.lat !== 'number' || typeof location.lng !== 'number') {
      return null;
    }
    return { lat: location.lat, lng: location.lng };
  }
}
