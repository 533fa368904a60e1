import { Factory } from 'fishery';
import { faker } from '@faker-js/faker';

import type { users } from '../schema/users';

type User = typeof users.$inferInsert;

/**
 * Builds insertable user rows. `passwordHash` is a placeholder; tests that log
 * in must hash a real password with hashPassword().
 */
export const userFactory = Factory.define<User>(({ sequence }) => ({
  id: crypto.randomUUID(),
  email: `user${String(sequence)}.${faker.string.alphanumeric(6).toLowerCase()}@test.leadscout.dev`,
  name: faker.person.fullName(),
  passwordHash: 'placeholder:hash',
  createdAt: new Date('2024-01-01T00:00:00.000Z'),
  updatedAt: new Date('2024-01-01T00:00:00.000Z'),

  emailVerified: true,
  emailVerifyToken: null,
  emailVerifyExpires: null,

  passwordResetToken: null,
  passwordResetExpires: null,
}));
