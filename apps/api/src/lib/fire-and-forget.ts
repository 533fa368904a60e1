/**
 * Start background work the response does not wait for, such as account
 * emails. A rejection is logged under `[background]` and never reaches the
 * caller.
 */
export function fireAndForget(promise: Promise<unknown>, errorContext: string): void {
  void promise.catch((error: unknown) => {
    console.error(`[background] Failed to ${errorContext}:`, error);
  });
}
