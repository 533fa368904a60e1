export {
  authorizeGuestSearch,
  recordGuestSearch,
  pruneGuestUsage,
  type GuestDenyReason,
  type GuestUsageDecision,
  type GuestUsageRecordResult,
  type GuestUsageOptions,
  type PruneGuestUsageOptions,
} from './guest-usage.js';
