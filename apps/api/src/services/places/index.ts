import { createEnvUtilities, type EnvContext } from '@leadscout/shared';
import type { PlacesClient } from './types.js';
import { createGooglePlacesClient } from './google.js';
import { createMockPlacesClient } from './mock.js';

export type { MockPlacesClient, Place, PlacesClient, PlacesErrorCode, TextSearchRequest } from './types.js';
export { PlacesApiError, placeSchema } from './types.js';
export { createGooglePlacesClient, PLACES_FIELD_MASK } from './google.js';
export { createMockPlacesClient, MOCK_CENTER } from './mock.js';
export { filterLeads, milesToMeters, searchLeads, toLead, type LeadFilter, type LeadSearchResult } from './leads.js';

interface PlacesEnv extends EnvContext {
  GOOGLE_MAPS_API_KEY?: string | undefined;
}

/**
 * Get the places client for the environment.
 *
 * - With an API key: Google client
 * - Without one in local dev or CI: mock client
 * - Production: requires the key, fails fast if missing
 */
export function getPlacesClient(env: PlacesEnv): PlacesClient {
  const { requiresRealServices } = createEnvUtilities(env);

  if (env.GOOGLE_MAPS_API_KEY) {
    return createGooglePlacesClient(env.GOOGLE_MAPS_API_KEY);
  }

  if (requiresRealServices) {
    throw new Error('GOOGLE_MAPS_API_KEY required in production');
  }

  return createMockPlacesClient();
}
