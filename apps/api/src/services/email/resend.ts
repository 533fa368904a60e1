import { z } from 'zod';
import type { EmailClient, EmailOptions } from './types.js';
import { SUPPORT_EMAIL } from './templates/base.js';

const DEFAULT_FROM = 'LeadScout <noreply@mail.leadscout.dev>';
const RESEND_API_URL = 'https://api.resend.com/emails';

const resendErrorSchema = z.object({ message: z.string() });

export function createResendEmailClient(apiKey: string): EmailClient {
  return {
    async sendEmail(options: EmailOptions): Promise<void> {
      const response = await fetch(RESEND_API_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          from: options.from ?? DEFAULT_FROM,
          to: options.to,
          subject: options.subject,
          html: options.html,
          reply_to: options.replyTo ?? SUPPORT_EMAIL,
          ...(options.text && { text: options.text }),
        }),
      });

      if (!response.ok) {
        const body: unknown = await response.json().catch(() => null);
        const parsed = resendErrorSchema.safeParse(body);
        const reason = parsed.success ? parsed.data.message : `HTTP ${String(response.status)}`;
        throw new Error(`Failed to send email: ${reason}`);
      }
    },
  };
}
