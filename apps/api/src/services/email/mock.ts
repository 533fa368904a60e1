import type { EmailOptions, MockEmailClient, SentEmail } from './types.js';

export function createMockEmailClient(): MockEmailClient {
  const sent: SentEmail[] = [];

  return {
    sendEmail(options: EmailOptions): Promise<void> {
      sent.push({ ...options });
      return Promise.resolve();
    },

    getSentEmails(): SentEmail[] {
      return [...sent];
    },

    clearSentEmails(): void {
      sent.length = 0;
    },
  };
}
