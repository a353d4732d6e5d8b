// src/providers/places/mock-places.provider.ts

import { NearbySearchArgs, PlaceCandidate, PlacesProvider } from './places.provider.interface';

const MOCK_ATTRACTIONS: PlaceCandidate[] = [
  { name: 'Old Town Walking Trail', rating: 4.6, userRatingsTotal: 820, types: ['tourist_attraction'] },
  { name: 'City History Museum', rating: 4.5, userRatingsTotal: 2310, types: ['museum', 'tourist_attraction'] },
  { name: 'Riverside Botanical Garden', rating: 4.7, userRatingsTotal: 1540, types: ['park', 'tourist_attraction'] },
  { name: 'Central Food Market', rating: 4.4, userRatingsTotal: 3120, types: ['tourist_attraction'] },
];

const MOCK_LODGING: PlaceCandidate[] = [
  { name: 'Harbour View Hotel', rating: 4.5, priceLevel: 3, vicinity: '1 Quay Street', userRatingsTotal: 1210, types: ['lodging', 'hotel'] },
  { name: 'Backpackers Hub', rating: 4.1, priceLevel: 1, vicinity: '22 Station Road', userRatingsTotal: 640, types: ['lodging', 'hostel'] },
  { name: 'Garden Guesthouse', rating: 4.7, priceLevel: 2, vicinity: '8 Elm Lane', userRatingsTotal: 310, types: ['lodging', 'guest_house'] },
  { name: 'Grand Palace Resort', rating: 4.8, priceLevel: 4, vicinity: '100 Park Avenue', userRatingsTotal: 2050, types: ['lodging', 'resort_hotel'] },
  { name: 'Budget Inn Central', rating: 3.6, priceLevel: 0, vicinity: '5 Market Square', userRatingsTotal: 95, types: ['lodging'] },
];

/**
 * Mock places provider (development and tests)
 *
 * Returns the same fixed places for every location.
 */
export class MockPlacesProvider implements PlacesProvider {
  async nearby(args: NearbySearchArgs): Promise<PlaceCandidate[]> {
    const source = args.category === 'attraction' ? MOCK_ATTRACTIONS : MOCK_LODGING;
    return source.map((place) => ({ ...place, types: [...place.types] }));
  }
}
