import { createEnvUtilities, type EnvContext } from '@leadscout/shared';
import { fireAndForget } from '../../lib/fire-and-forget.js';
import { frontendLink } from '../../lib/frontend-url.js';
import { EMAIL_VERIFY_TOKEN_EXPIRY_MS, PASSWORD_RESET_TOKEN_EXPIRY_MS } from '../../constants/auth.js';
import type { EmailClient } from './types.js';
import { createConsoleEmailClient } from './console.js';
import { createResendEmailClient } from './resend.js';
import { passwordChangedEmail, passwordResetEmail, verificationEmail } from './templates/index.js';

interface EmailEnv extends EnvContext {
  RESEND_API_KEY?: string | undefined;
}

/**
 * Local dev and CI print verification and reset links to the console.
 * Anything else sends through Resend and needs its key.
 */
export function selectEmailClient(env: EmailEnv): EmailClient {
  const { isLocalDev, isCI } = createEnvUtilities(env);

  if (isLocalDev || isCI) {
    return createConsoleEmailClient();
  }

  if (!env.RESEND_API_KEY) {
    throw new Error('RESEND_API_KEY required in production');
  }

  return createResendEmailClient(env.RESEND_API_KEY);
}

export interface Recipient {
  email: string;
  name: string | null;
}

/** Account emails. Sends run in the background; failures are logged. */
export interface AccountMailer {
  sendVerification(recipient: Recipient, token: string): void;
  sendPasswordReset(recipient: Recipient, token: string): void;
  sendPasswordChanged(recipient: Recipient): void;
}

export function createAccountMailer(
  client: EmailClient,
  frontendUrl: string | undefined
): AccountMailer {
  return {
    sendVerification(recipient, token) {
      const content = verificationEmail({
        userName: recipient.name,
        verificationUrl: frontendLink(frontendUrl, '/verify-email', { token }),
        expiresInHours: EMAIL_VERIFY_TOKEN_EXPIRY_MS / (60 * 60 * 1000),
      });
      fireAndForget(client.sendEmail({ to: recipient.email, ...content }), 'send verification email');
    },

    sendPasswordReset(recipient, token) {
      const content = passwordResetEmail({
        userName: recipient.name,
        resetUrl: frontendLink(frontendUrl, '/reset-password', { token }),
        expiresInMinutes: PASSWORD_RESET_TOKEN_EXPIRY_MS / (60 * 1000),
      });
      fireAndForget(client.sendEmail({ to: recipient.email, ...content }), 'send password reset email');
    },

    sendPasswordChanged(recipient) {
      const content = passwordChangedEmail({ userName: recipient.name });
      fireAndForget(
        client.sendEmail({ to: recipient.email, ...content }),
        'send password changed email'
      );
    },
  };
}
