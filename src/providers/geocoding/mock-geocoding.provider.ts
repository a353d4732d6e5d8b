// src/providers/geocoding/mock-geocoding.provider.ts

import { GeocodingProvider, GeoPoint } from './geocoding.provider.interface';

const MOCK_CITIES: Record<string, GeoPoint> = {
  london: { lat: 51.5072, lng: -0.1276 },
  paris: { lat: 48.8566, lng: 2.3522 },
  rome: { lat: 41.9028, lng: 12.4964 },
  barcelona: { lat: 41.3874, lng: 2.1686 },
  edinburgh: { lat: 55.9533, lng: -3.1883 },
  tokyo: { lat: 35.6762, lng: 139.6503 },
  'new york': { lat: 40.7128, lng: -74.006 },
};

/**
 * Mock geocoder (development and tests)
 *
 * Knows a handful of cities by name; matches on the part before the first comma,
 * so "Paris, France" resolves too.
 */
export class MockGeocodingProvider implements GeocodingProvider {
  async geocode(address: string): Promise<GeoPoint | null> {
    const key = address.split(',')[0].trim().toLowerCase();
    const point = MOCK_CITIES[key];
    return point ? { ...point } : null;
  }
}
