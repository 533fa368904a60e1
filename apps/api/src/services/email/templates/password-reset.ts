import { z } from 'zod';
import { COLORS } from './base.js';
import { defineEmailTemplate, greetingFor } from './builder.js';

const schema = z.object({
  userName: z.string().nullish(),
  resetUrl: z.string().url(),
  expiresInMinutes: z.number().int().positive().default(60),
});

export const passwordResetEmail = defineEmailTemplate({
  subject: 'Reset your LeadScout password',
  schema,
  prepare: (params) => ({
    greeting: greetingFor(params.userName),
    resetUrl: params.resetUrl,
    expiresInMinutes: String(params.expiresInMinutes),
  }),
  html: `
    <h1 style="margin: 0 0 16px 0; color: ${COLORS.textPrimary}; font-size: 22px; font-weight: 600;">
      Reset your password
    </h1>
    <p style="margin: 0 0 8px 0; color: ${COLORS.textPrimary}; font-size: 16px; line-height: 1.5;">
      {{greeting}}
    </p>
    <p style="margin: 0 0 24px 0; color: ${COLORS.textSecondary}; font-size: 16px; line-height: 1.5;">
      We received a request to reset your password.
    </p>
    <table role="presentation" cellpadding="0" cellspacing="0" style="margin: 0 0 24px 0;">
      <tr>
        <td align="center" style="background-color: ${COLORS.accent}; border-radius: 6px;">
          <a href="{{resetUrl}}" style="display: inline-block; padding: 14px 28px; color: #ffffff; font-size: 16px; font-weight: 600; text-decoration: none;">
            Choose a new password
          </a>
        </td>
      </tr>
    </table>
    <p style="margin: 0; color: ${COLORS.textSecondary}; font-size: 14px;">
      This link expires in {{expiresInMinutes}} minutes.
    </p>
    <p style="margin: 16px 0 0 0; color: ${COLORS.textSecondary}; font-size: 12px; line-height: 1.5;">
      If you didn't ask for a reset, you can ignore this email. Your password stays the same.
    </p>
  `,
  text: `Reset your password

{{greeting}}

We received a request to reset your password. Choose a new one here:
{{resetUrl}}

This link expires in {{expiresInMinutes}} minutes.

If you didn't ask for a reset, you can ignore this email. Your password stays the same.
`,
});
