import type { ProfileResponse } from '@leadscout/shared';
import type { AuthUser } from '../types.js';

export function toProfile(user: AuthUser): ProfileResponse {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    emailVerified: user.emailVerified,
    createdAt: user.createdAt.toISOString(),
  };
}
