export { users } from './users';
export { guestUsage } from './guest-usage';
