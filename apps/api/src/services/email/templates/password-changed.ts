import { z } from 'zod';
import { COLORS, SUPPORT_EMAIL } from './base.js';
import { defineEmailTemplate, greetingFor } from './builder.js';

const schema = z.object({
  userName: z.string().nullish(),
});

export const passwordChangedEmail = defineEmailTemplate({
  subject: 'Your LeadScout password was changed',
  schema,
  prepare: (params) => ({ greeting: greetingFor(params.userName) }),
  html: `
    <h1 style="margin: 0 0 16px 0; color: ${COLORS.textPrimary}; font-size: 22px; font-weight: 600;">
      Password Changed
    </h1>
    <p style="margin: 0 0 8px 0; color: ${COLORS.textPrimary}; font-size: 16px; line-height: 1.5;">
      {{greeting}}
    </p>
    <p style="margin: 0 0 16px 0; color: ${COLORS.textSecondary}; font-size: 16px; line-height: 1.5;">
      Your password was just changed. If this was you, no action is needed.
    </p>
    <p style="margin: 0; color: ${COLORS.textSecondary}; font-size: 12px; line-height: 1.5;">
      If you didn't change your password, contact us at <a href="mailto:${SUPPORT_EMAIL}" style="color: ${COLORS.accent}; text-decoration: none;">${SUPPORT_EMAIL}</a>
    </p>
  `,
  text: `Password Changed

{{greeting}}

Your password was just changed. If this was you, no action is needed.

If you didn't change your password, contact us at ${SUPPORT_EMAIL}
`,
});
