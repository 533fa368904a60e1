export { userFactory } from './user';
export { guestUsageFactory } from './guest-usage';
