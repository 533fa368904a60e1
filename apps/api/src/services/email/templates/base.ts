const COLORS = {
  background: '#f4f6f8',
  card: '#ffffff',
  textPrimary: '#111827',
  textSecondary: '#6b7280',
  accent: '#1a73e8',
  border: '#e5e7eb',
} as const;

export const BRAND_NAME = 'LeadScout';
export const SUPPORT_EMAIL = 'support@leadscout.dev';

export function wrapInBaseTemplate(content: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${BRAND_NAME}</title>
</head>
<body style="margin: 0; padding: 0; background-color: ${COLORS.background}; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif;">
  <table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="background-color: ${COLORS.background};">
    <tr>
      <td align="center" style="padding: 40px 20px;">
        <table role="presentation" width="600" cellpadding="0" cellspacing="0" style="max-width: 600px; width: 100%;">
          <!-- Header -->
          <tr>
            <td align="center" style="padding: 20px 0;">
              <span style="font-size: 22px; font-weight: 700; color: ${COLORS.accent};">${BRAND_NAME}</span>
            </td>
          </tr>
          <!-- Content Card -->
          <tr>
            <td>
              <table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="background-color: ${COLORS.card}; border-radius: 8px; border: 1px solid ${COLORS.border};">
                <tr>
                  <td style="padding: 32px;">
                    ${content}
                  </td>
                </tr>
              </table>
            </td>
          </tr>
          <!-- Footer -->
          <tr>
            <td align="center" style="padding: 20px 0;">
              <p style="margin: 0; color: ${COLORS.textSecondary}; font-size: 12px;">
                Questions? <a href="mailto:${SUPPORT_EMAIL}" style="color: ${COLORS.accent}; text-decoration: none;">${SUPPORT_EMAIL}</a>
              </p>
            </td>
          </tr>
        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;
}

export { COLORS };
