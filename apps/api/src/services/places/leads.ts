import {
  MAX_SEARCH_RADIUS_METERS,
  METERS_PER_MILE,
  type Coordinates,
  type Lead,
  type SearchRequest,
} from '@leadscout/shared';
import type { Place, PlacesClient } from './types.js';

export function milesToMeters(miles: number): number {
  return Math.min(Math.round(miles * METERS_PER_MILE), MAX_SEARCH_RADIUS_METERS);
}

export function toLead(place: Place): Lead {
  return {
    placeId: place.id,
    name: place.displayName?.text ?? 'Unnamed business',
    address: place.formattedAddress ?? null,
    phone: place.nationalPhoneNumber ?? place.internationalPhoneNumber ?? null,
    website: place.websiteUri ?? null,
    rating: place.rating ?? null,
    reviewCount: place.userRatingCount ?? null,
    businessStatus: place.businessStatus ?? null,
    types: place.types ?? [],
    openingHours: place.regularOpeningHours?.weekdayDescriptions ?? [],
    googleMapsUrl: place.googleMapsUri ?? null,
    lat: place.location.latitude,
    lng: place.location.longitude,
  };
}

export interface LeadFilter {
  /** Keep leads with fewer reviews than this; a missing count is zero */
  maxReviews?: number | undefined;
  excludeWithWebsite?: boolean | undefined;
}

/**
 * Keep the businesses worth contacting. Leads whose status is known and not
 * OPERATIONAL are always dropped.
 */
export function filterLeads(leads: Lead[], filter: LeadFilter = {}): Lead[] {
  const { maxReviews, excludeWithWebsite = false } = filter;

  return leads.filter((lead) => {
    if (lead.businessStatus !== null && lead.businessStatus !== 'OPERATIONAL') {
      return false;
    }
    if (maxReviews !== undefined && (lead.reviewCount ?? 0) >= maxReviews) {
      return false;
    }
    if (excludeWithWebsite && lead.website !== null) {
      return false;
    }
    return true;
  });
}

export interface LeadSearchResult {
  center: Coordinates;
  leads: Lead[];
}

/**
 * Geocode the city, search around it and return the filtered leads.
 * Errors from the client propagate as PlacesApiError.
 */
export async function searchLeads(
  client: PlacesClient,
  params: SearchRequest
): Promise<LeadSearchResult> {
  const center = await client.geocode(params.city);
  const places = await client.searchText({
    query: `${params.businessType} in ${params.city}`,
    center,
    radiusMeters: milesToMeters(params.radiusMiles),
  });

  const leads = filterLeads(places.map(toLead), {
    maxReviews: params.maxReviews,
    excludeWithWebsite: params.excludeWithWebsite,
  });

  return { center, leads };
}
