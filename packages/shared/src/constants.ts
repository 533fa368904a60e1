/** Maximum free searches per window for guest (unauthenticated) users */
export const GUEST_SEARCH_LIMIT = 5;

/** Length of the guest usage window in hours */
export const GUEST_WINDOW_HOURS = 24;

/** Guest usage window in milliseconds (derived from GUEST_WINDOW_HOURS) */
export const GUEST_WINDOW_MS = GUEST_WINDOW_HOURS * 60 * 60 * 1000;

/** Guest usage rows untouched for this many days are pruned by maintenance */
export const GUEST_USAGE_RETENTION_DAYS = 30;

export const METERS_PER_MILE = 1609.34;

/** Upper bound the places API accepts for a location bias radius */
export const MAX_SEARCH_RADIUS_METERS = 50_000;

export const DEFAULT_SEARCH_RADIUS_MILES = 3;

export const MAX_SEARCH_RADIUS_MILES = 31;

/** Maximum number of leads accepted by a single export request */
export const MAX_EXPORT_LEADS = 500;

