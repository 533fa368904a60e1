import { Hono } from 'hono';
import {
  ERROR_CODE_FORBIDDEN,
  ERROR_CODE_LOCATION_NOT_FOUND,
  ERROR_CODE_RATE_LIMITED,
  ERROR_CODE_SERVICE_UNAVAILABLE,
  ERROR_CODE_UPSTREAM,
  searchRequestSchema,
  type SearchResponse,
} from '@leadscout/shared';
import type { AppEnv } from '../types.js';
import {
  authorizeGuestSearch,
  recordGuestSearch,
  type GuestDenyReason,
} from '../services/guest-usage/index.js';
import { PlacesApiError, searchLeads, type LeadSearchResult } from '../services/places/index.js';
import { resolveClientKey } from '../lib/client-ip.js';
import { getGuestSettings } from '../lib/guest-settings.js';
import { createErrorResponse } from '../lib/error-response.js';
import { validateJson } from '../lib/validate.js';
import {
  ERROR_GUEST_SEARCH_LIMIT,
  ERROR_GUEST_UNIDENTIFIED,
  ERROR_LOCATION_NOT_FOUND,
  ERROR_PLACES_FAILED,
  ERROR_SEARCH_UNAVAILABLE,
} from '../constants/errors.js';

const GUEST_DENIALS = {
  daily_limit_reached: { message: ERROR_GUEST_SEARCH_LIMIT, code: ERROR_CODE_RATE_LIMITED, status: 429 },
  client_unidentified: { message: ERROR_GUEST_UNIDENTIFIED, code: ERROR_CODE_FORBIDDEN, status: 403 },
  storage_unavailable: {
    message: ERROR_SEARCH_UNAVAILABLE,
    code: ERROR_CODE_SERVICE_UNAVAILABLE,
    status: 503,
  },
} as const satisfies Record<GuestDenyReason, { message: string; code: string; status: number }>;

function guestDenial(reason: GuestDenyReason) {
  const { message, code, status } = GUEST_DENIALS[reason];
  return { body: createErrorResponse(message, code), status };
}

function placesFailure(error: PlacesApiError) {
  if (error.code === 'LOCATION_NOT_FOUND') {
    return {
      body: createErrorResponse(ERROR_LOCATION_NOT_FOUND, ERROR_CODE_LOCATION_NOT_FOUND),
      status: 400 as const,
    };
  }
  console.error('[search] Places request failed:', error);
  return { body: createErrorResponse(ERROR_PLACES_FAILED, ERROR_CODE_UPSTREAM), status: 502 as const };
}

/**
 * POST / - search for leads.
 *
 * Signed-in users search without limits. Guests are checked before the
 * places API is called, and the search is recorded after it succeeds; the
 * recording step is what enforces the ceiling, so a guest who raced past
 * the check is still denied. Failed searches are not counted.
 */
export function createSearchRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post('/', validateJson(searchRequestSchema), async (c) => {
    const params = c.req.valid('json');
    const user = c.get('user');
    const db = c.get('db');

    const { limit, includeUserAgent } = getGuestSettings(c.env);
    const clientKey = user ? null : resolveClientKey(c, { includeUserAgent });

    if (!user) {
      const decision = await authorizeGuestSearch(db, clientKey, { limit });
      if (!decision.allowed) {
        const denial = guestDenial(decision.reason);
        return c.json(denial.body, denial.status);
      }
    }

    let result: LeadSearchResult;
    try {
      result = await searchLeads(c.get('places'), params);
    } catch (error) {
      if (error instanceof PlacesApiError) {
        const failure = placesFailure(error);
        return c.json(failure.body, failure.status);
      }
      throw error;
    }

    if (user) {
      return c.json(result satisfies SearchResponse, 200);
    }

    const recorded = await recordGuestSearch(db, clientKey, { limit });
    if (!recorded.recorded) {
      const denial = guestDenial(recorded.reason);
      return c.json(denial.body, denial.status);
    }

    const response: SearchResponse = { ...result, remainingFreeSearches: recorded.remaining };
    return c.json(response, 200);
  });

  return app;
}
