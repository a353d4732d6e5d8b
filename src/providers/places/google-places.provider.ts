// src/providers/places/google-places.provider.ts

import { BaseProvider } from '../base.provider';
import { HttpClientFactory } from '../../common/utils/http-client.factory';
import { NearbySearchArgs, PlaceCandidate, PlaceCategory, PlacesProvider } from './places.provider.interface';

interface GoogleNearbyPlace {
  place_id?: string;
  name?: string;
  rating?: number;
  price_level?: number;
  vicinity?: string;
  user_ratings_total?: number;
  types?: string[];
}

interface GoogleNearbyResponse {
  status: string;
  error_message?: string;
  results?: GoogleNearbyPlace[];
}

const GOOGLE_PLACE_TYPES: Record<PlaceCategory, string> = {
  attraction: 'tourist_attraction',
  lodging: 'lodging',
};

/**
 * Google Places Nearby Search provider
 *
 * API docs: https://developers.google.com/maps/documentation/places/web-service/search-nearby
 */
export class GooglePlacesProvider extends BaseProvider implements PlacesProvider {
  constructor(apiKey: string) {
    super(GooglePlacesProvider.name, {
      baseURL: 'https://maps.googleapis.com/maps/api/place',
      timeout: 30000,
    });
    this.httpClient = HttpClientFactory.createWithApiKey(apiKey, {
      baseURL: 'https://maps.googleapis.com/maps/api/place',
      timeout: 30000,
      paramName: 'key',
      additionalParams: { language: 'en' },
    });
  }

  async nearby(args: NearbySearchArgs): Promise<PlaceCandidate[]> {
    const { location, category, radiusM } = args;

    const response = await this.httpClient.get<GoogleNearbyResponse>('/nearbysearch/json', {
      params: {
        location: `${location.lat},${location.lng}`,
        radius: radiusM,
        type: GOOGLE_PLACE_TYPES[category],
      },
    });
    const data = response.data;

    if (data.status !== 'OK' && data.status !== 'ZERO_RESULTS') {
      throw new Error(`Google Places API returned status: ${data.status}${data.error_message ? ` (${data.error_message})` : ''}`);
    }

    const results = data.results ?? [];
    this.logger.debug(`Nearby ${category} search returned ${results.length} places`);

    return results
      .filter((place): place is GoogleNearbyPlace & { name: string } => typeof place.name === 'string')
      .map((place) => ({
        placeId: place.place_id,
        name: place.name,
        rating: place.rating,
        priceLevel: place.price_level,
        vicinity: place.vicinity,
        userRatingsTotal: place.user_ratings_total ?? 0,
        types: place.types ?? [],
      }));
  }
}
