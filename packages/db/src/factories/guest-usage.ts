import { Factory } from 'fishery';
import { faker } from '@faker-js/faker';

import type { guestUsage } from '../schema/guest-usage';

type GuestUsage = typeof guestUsage.$inferInsert;

export const guestUsageFactory = Factory.define<GuestUsage>(() => {
  const seenAt = new Date('2024-01-15T12:00:00.000Z');
  return {
    id: crypto.randomUUID(),
    clientKey: faker.string.hexadecimal({ length: 64, casing: 'lower', prefix: '' }),
    searchCount: 0,
    firstSeenAt: seenAt,
    lastSeenAt: seenAt,
    updatedAt: seenAt,
  };
});
