import type { EmailClient, EmailOptions } from './types.js';

const ACTION_LINK_PATTERN = /href="([^"]*(?:verify-email|reset-password)[^"]*)"/;

export function createConsoleEmailClient(): EmailClient {
  return {
    sendEmail(options: EmailOptions): Promise<void> {
      console.log('=== Email Sent ===');
      console.log(`To: ${options.to}`);
      console.log(`Subject: ${options.subject}`);
      if (options.from) {
        console.log(`From: ${options.from}`);
      }
      console.log('--- Text Content ---');
      console.log(options.text ?? options.html);
      console.log('==================');

      const linkMatch = ACTION_LINK_PATTERN.exec(options.html);
      if (linkMatch?.[1]) {
        // Templates escape & in hrefs
        console.log(`Action link: ${linkMatch[1].replaceAll('&amp;', '&')}`);
      }

      return Promise.resolve();
    },
  };
}
