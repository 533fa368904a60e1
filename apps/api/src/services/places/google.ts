import { z } from 'zod';
import type { Coordinates } from '@leadscout/shared';
import {
  PlacesApiError,
  placeSchema,
  type Place,
  type PlacesClient,
  type TextSearchRequest,
} from './types.js';

const GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json';
const SEARCH_TEXT_URL = 'https://places.googleapis.com/v1/places:searchText';

/** Results per text search; the API maximum */
export const MAX_RESULT_COUNT = 20;

export const PLACES_FIELD_MASK = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.nationalPhoneNumber',
  'places.internationalPhoneNumber',
  'places.websiteUri',
  'places.rating',
  'places.userRatingCount',
  'places.businessStatus',
  'places.types',
  'places.regularOpeningHours.weekdayDescriptions',
  'places.googleMapsUri',
  'places.location',
].join(',');

const geocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        geometry: z.object({ location: z.object({ lat: z.number(), lng: z.number() }) }),
      })
    )
    .default([]),
});

const searchTextResponseSchema = z.object({
  places: z.array(z.unknown()).default([]),
});

const googleErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

async function send(url: string, init: RequestInit | undefined, context: string): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (error) {
    console.error(`[places] ${context} request failed:`, error);
    throw new PlacesApiError(`${context} request failed`);
  }
}

async function readJson(response: Response, context: string): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    throw new PlacesApiError(
      `${context}: expected JSON but received unparseable body (HTTP ${String(response.status)})`,
      'UPSTREAM',
      response.status
    );
  }
}

async function describeFailure(response: Response, context: string): Promise<PlacesApiError> {
  const body = await readJson(response, context).catch(() => null);
  const parsed = googleErrorSchema.safeParse(body);
  const reason = parsed.success ? parsed.data.error.message : `HTTP ${String(response.status)}`;
  return new PlacesApiError(`${context} failed: ${reason}`, 'UPSTREAM', response.status);
}

function parsePlaces(raw: unknown[]): Place[] {
  return raw.flatMap((item) => {
    const parsed = placeSchema.safeParse(item);
    if (!parsed.success) {
      console.warn('[places] Skipping malformed place:', parsed.error.issues);
      return [];
    }
    return [parsed.data];
  });
}

export function createGooglePlacesClient(apiKey: string): PlacesClient {
  if (!apiKey.trim()) {
    throw new Error('GOOGLE_MAPS_API_KEY is required and cannot be empty');
  }

  return {
    isMock: false,

    async geocode(address: string): Promise<Coordinates> {
      const params = new URLSearchParams({ address, key: apiKey });
      const response = await send(`${GEOCODE_URL}?${params.toString()}`, undefined, 'Geocoding');

      if (!response.ok) {
        throw await describeFailure(response, 'Geocoding');
      }

      const parsed = geocodeResponseSchema.safeParse(await readJson(response, 'Geocoding'));
      if (!parsed.success) {
        throw new PlacesApiError('Geocoding returned an unexpected response', 'UPSTREAM', response.status);
      }

      const { status, results, error_message: errorMessage } = parsed.data;
      if (status === 'ZERO_RESULTS') {
        throw new PlacesApiError(`No location found for "${address}"`, 'LOCATION_NOT_FOUND');
      }
      if (status !== 'OK') {
        throw new PlacesApiError(`Geocoding failed: ${status}${errorMessage ? ` (${errorMessage})` : ''}`);
      }

      const first = results[0];
      if (!first) {
        throw new PlacesApiError(`No location found for "${address}"`, 'LOCATION_NOT_FOUND');
      }
      return { lat: first.geometry.location.lat, lng: first.geometry.location.lng };
    },

    async searchText(request: TextSearchRequest): Promise<Place[]> {
      const response = await send(
        SEARCH_TEXT_URL,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'X-Goog-Api-Key': apiKey,
            'X-Goog-FieldMask': PLACES_FIELD_MASK,
          },
          body: JSON.stringify({
            textQuery: request.query,
            maxResultCount: MAX_RESULT_COUNT,
            locationBias: {
              circle: {
                center: { latitude: request.center.lat, longitude: request.center.lng },
                radius: request.radiusMeters,
              },
            },
          }),
        },
        'Places search'
      );

      if (!response.ok) {
        throw await describeFailure(response, 'Places search');
      }

      const parsed = searchTextResponseSchema.safeParse(await readJson(response, 'Places search'));
      if (!parsed.success) {
        throw new PlacesApiError('Places search returned an unexpected response', 'UPSTREAM', response.status);
      }

      return parsePlaces(parsed.data.places);
    },
  };
}
