import type { Coordinates } from '@leadscout/shared';
import type { MockPlacesClient, Place, TextSearchRequest } from './types.js';

/** Coordinates every mock geocode resolves to */
export const MOCK_CENTER: Coordinates = { lat: 40.7128, lng: -74.006 };

function mockPlaces(query: string, center: Coordinates): Place[] {
  const label = query.replace(/\s+in\s+.*$/i, '');
  const base = {
    types: ['point_of_interest', 'establishment'],
    regularOpeningHours: { weekdayDescriptions: ['Monday: 9:00 AM – 5:00 PM'] },
  };

  return [
    {
      ...base,
      id: 'mock-place-1',
      displayName: { text: `Corner ${label}` },
      formattedAddress: '12 Main St, Springfield',
      nationalPhoneNumber: '(555) 010-0001',
      rating: 4.6,
      userRatingCount: 3,
      businessStatus: 'OPERATIONAL',
      googleMapsUri: 'https://maps.google.com/?cid=1',
      location: { latitude: center.lat + 0.001, longitude: center.lng + 0.001 },
    },
    {
      ...base,
      id: 'mock-place-2',
      displayName: { text: `Family ${label}` },
      formattedAddress: '48 Oak Ave, Springfield',
      nationalPhoneNumber: '(555) 010-0002',
      websiteUri: 'https://example.com/family',
      rating: 4.1,
      userRatingCount: 12,
      businessStatus: 'OPERATIONAL',
      googleMapsUri: 'https://maps.google.com/?cid=2',
      location: { latitude: center.lat - 0.002, longitude: center.lng + 0.003 },
    },
    {
      ...base,
      id: 'mock-place-3',
      displayName: { text: `Downtown ${label}` },
      formattedAddress: '7 Market Sq, Springfield',
      rating: 4.8,
      userRatingCount: 240,
      businessStatus: 'OPERATIONAL',
      websiteUri: 'https://example.com/downtown',
      googleMapsUri: 'https://maps.google.com/?cid=3',
      location: { latitude: center.lat + 0.004, longitude: center.lng - 0.002 },
    },
    {
      id: 'mock-place-4',
      displayName: { text: `Old ${label}` },
      formattedAddress: '3 Mill Rd, Springfield',
      businessStatus: 'CLOSED_PERMANENTLY',
      location: { latitude: center.lat - 0.003, longitude: center.lng - 0.004 },
    },
  ];
}

export function createMockPlacesClient(): MockPlacesClient {
  const history: TextSearchRequest[] = [];

  return {
    isMock: true,

    geocode(): Promise<Coordinates> {
      return Promise.resolve({ ...MOCK_CENTER });
    },

    searchText(request: TextSearchRequest): Promise<Place[]> {
      history.push({ ...request });
      return Promise.resolve(mockPlaces(request.query, request.center));
    },

    getSearchHistory(): TextSearchRequest[] {
      return [...history];
    },

    clearHistory(): void {
      history.length = 0;
    },
  };
}
