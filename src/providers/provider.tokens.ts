// src/providers/provider.tokens.ts

export const GEOCODING_PROVIDER = 'GEOCODING_PROVIDER';
export const PLACES_PROVIDER = 'PLACES_PROVIDER';
export const WEATHER_PROVIDER = 'WEATHER_PROVIDER';
