// src/providers/places/places.provider.interface.ts

import { GeoPoint } from '../geocoding/geocoding.provider.interface';

/**
 * Place categories the planner searches for
 */
export type PlaceCategory = 'attraction' | 'lodging';

/**
 * Raw place record as returned by a places lookup
 */
export interface PlaceCandidate {
  placeId?: string;
  name: string;
  /** Usually a number; absent or unparsable values are treated as 0 */
  rating?: number | string | null;
  /** Ordinal price level 0-4 */
  priceLevel?: number | null;
  vicinity?: string;
  /** Number of reviews */
  userRatingsTotal?: number;
  /** Place type tags, e.g. ['lodging', 'hotel'] */
  types: string[];
}

export interface NearbySearchArgs {
  location: GeoPoint;
  category: PlaceCategory;
  /** Search radius in metres */
  radiusM: number;
}

/**
 * Places search provider
 */
export interface PlacesProvider {
  nearby(args: NearbySearchArgs): Promise<PlaceCandidate[]>;
}
