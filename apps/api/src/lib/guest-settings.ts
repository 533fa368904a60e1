import { GUEST_SEARCH_LIMIT } from '@leadscout/shared';

interface GuestSettingsEnv {
  GUEST_DAILY_SEARCH_LIMIT?: number;
  GUEST_KEY_INCLUDE_USER_AGENT?: boolean;
}

export interface GuestSettings {
  limit: number;
  includeUserAgent: boolean;
}

/** Guest limit settings from bindings, which are absent in some tests */
export function getGuestSettings(env: GuestSettingsEnv | undefined): GuestSettings {
  return {
    limit: env?.GUEST_DAILY_SEARCH_LIMIT ?? GUEST_SEARCH_LIMIT,
    includeUserAgent: env?.GUEST_KEY_INCLUDE_USER_AGENT ?? false,
  };
}
