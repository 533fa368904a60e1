import { z } from 'zod';
import { COLORS } from './base.js';
import { defineEmailTemplate, greetingFor } from './builder.js';

const schema = z.object({
  userName: z.string().nullish(),
  verificationUrl: z.string().url(),
  expiresInHours: z.number().int().positive().default(24),
});

export const verificationEmail = defineEmailTemplate({
  subject: 'Verify your LeadScout email',
  schema,
  prepare: (params) => ({
    greeting: greetingFor(params.userName),
    verificationUrl: params.verificationUrl,
    expiresInHours: String(params.expiresInHours),
  }),
  html: `
    <h1 style="margin: 0 0 16px 0; color: ${COLORS.textPrimary}; font-size: 22px; font-weight: 600;">
      Welcome to LeadScout
    </h1>
    <p style="margin: 0 0 8px 0; color: ${COLORS.textPrimary}; font-size: 16px; line-height: 1.5;">
      {{greeting}}
    </p>
    <p style="margin: 0 0 24px 0; color: ${COLORS.textSecondary}; font-size: 16px; line-height: 1.5;">
      Verify your email address to start searching without daily limits.
    </p>
    <table role="presentation" cellpadding="0" cellspacing="0" style="margin: 0 0 24px 0;">
      <tr>
        <td align="center" style="background-color: ${COLORS.accent}; border-radius: 6px;">
          <a href="{{verificationUrl}}" style="display: inline-block; padding: 14px 28px; color: #ffffff; font-size: 16px; font-weight: 600; text-decoration: none;">
            Verify Email
          </a>
        </td>
      </tr>
    </table>
    <p style="margin: 0; color: ${COLORS.textSecondary}; font-size: 14px;">
      This link expires in {{expiresInHours}} hours.
    </p>
    <p style="margin: 16px 0 0 0; color: ${COLORS.textSecondary}; font-size: 12px; line-height: 1.5;">
      If you didn't create a LeadScout account, you can ignore this email.
    </p>
  `,
  text: `Welcome to LeadScout

{{greeting}}

Verify your email address to start searching without daily limits:
{{verificationUrl}}

This link expires in {{expiresInHours}} hours.

If you didn't create a LeadScout account, you can ignore this email.
`,
});
