import { z } from 'zod';
import type { Coordinates } from '@leadscout/shared';

/**
 * A place as returned by the Places API (New) for the fields in
 * PLACES_FIELD_MASK. Only `id` and `location` are guaranteed.
 */
export const placeSchema = z.object({
  id: z.string(),
  displayName: z.object({ text: z.string() }).optional(),
  formattedAddress: z.string().optional(),
  nationalPhoneNumber: z.string().optional(),
  internationalPhoneNumber: z.string().optional(),
  websiteUri: z.string().optional(),
  rating: z.number().optional(),
  userRatingCount: z.number().int().optional(),
  businessStatus: z.string().optional(),
  types: z.array(z.string()).optional(),
  regularOpeningHours: z
    .object({ weekdayDescriptions: z.array(z.string()).optional() })
    .optional(),
  googleMapsUri: z.string().optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }),
});

export type Place = z.infer<typeof placeSchema>;

export interface TextSearchRequest {
  query: string;
  center: Coordinates;
  radiusMeters: number;
}

export interface PlacesClient {
  readonly isMock: boolean;
  geocode(address: string): Promise<Coordinates>;
  searchText(request: TextSearchRequest): Promise<Place[]>;
}

export interface MockPlacesClient extends PlacesClient {
  getSearchHistory(): TextSearchRequest[];
  clearHistory(): void;
}

export type PlacesErrorCode = 'LOCATION_NOT_FOUND' | 'UPSTREAM';

/**
 * Thrown by places clients. `LOCATION_NOT_FOUND` means the address could not
 * be geocoded; `UPSTREAM` covers every other API or network failure.
 */
export class PlacesApiError extends Error {
  readonly code: PlacesErrorCode;
  readonly status: number | undefined;

  constructor(message: string, code: PlacesErrorCode = 'UPSTREAM', status?: number) {
    super(message);
    this.name = 'PlacesApiError';
    this.code = code;
    this.status = status;
  }
}
