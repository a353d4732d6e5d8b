// src/providers/geocoding/geocoding.provider.interface.ts

/**
 * Geographic point (WGS84)
 */
export interface GeoPoint {
  lat: number;
  lng: number;
}

/**
 * Geocoding provider
 *
 * Resolves a free-form place name to a point. `null` means the name could not
 * be resolved; callers treat that as an invalid destination.
 */
export interface GeocodingProvider {
  geocode(address: string): Promise<GeoPoint | null>;
}
