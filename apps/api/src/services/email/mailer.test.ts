import { describe, it, expect, vi, afterEach } from 'vitest';
import { createAccountMailer, selectEmailClient } from './mailer.js';
import { createMockEmailClient } from './mock.js';
import type { EmailClient } from './types.js';

const RECIPIENT = { email: 'user@example.com', name: 'Dana' };

describe('selectEmailClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the console client in local development', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await selectEmailClient({ NODE_ENV: 'development' }).sendEmail({
      to: 'user@example.com',
      subject: 'Hi',
      html: '<p>Hi</p>',
    });

    expect(logSpy).toHaveBeenCalledWith('=== Email Sent ===');
  });

  it('uses the console client in CI even with a key', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await selectEmailClient({ NODE_ENV: 'production', CI: 'true', RESEND_API_KEY: 're_test_key' }).sendEmail({
      to: 'user@example.com',
      subject: 'Hi',
      html: '<p>Hi</p>',
    });

    expect(logSpy).toHaveBeenCalledWith('=== Email Sent ===');
  });

  it('throws in production without a key', () => {
    expect(() => selectEmailClient({ NODE_ENV: 'production' })).toThrow(
      'RESEND_API_KEY required in production'
    );
  });
});

describe('createAccountMailer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends a verification link into the frontend', () => {
    const client = createMockEmailClient();

    createAccountMailer(client, 'https://app.example.com').sendVerification(RECIPIENT, 'verify-token');

    const [sent] = client.getSentEmails();
    expect(sent?.to).toBe('user@example.com');
    expect(sent?.subject).toBe('Verify your LeadScout email');
    expect(sent?.text).toContain('https://app.example.com/verify-email?token=verify-token');
    expect(sent?.text).toContain('This link expires in 24 hours.');
  });

  it('sends a reset link that expires in an hour', () => {
    const client = createMockEmailClient();

    createAccountMailer(client, undefined).sendPasswordReset(RECIPIENT, 'reset-token');

    const [sent] = client.getSentEmails();
    expect(sent?.subject).toBe('Reset your LeadScout password');
    expect(sent?.text).toContain('http://localhost:5173/reset-password?token=reset-token');
    expect(sent?.text).toContain('This link expires in 60 minutes.');
  });

  it('sends a password changed notice', () => {
    const client = createMockEmailClient();

    createAccountMailer(client, undefined).sendPasswordChanged(RECIPIENT);

    expect(client.getSentEmails().map((email) => [email.to, email.subject])).toEqual([
      ['user@example.com', 'Your LeadScout password was changed'],
    ]);
  });

  it('logs a failed send without throwing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const error = new Error('Resend API error: 500');
    const client: EmailClient = { sendEmail: () => Promise.reject(error) };

    expect(() => {
      createAccountMailer(client, undefined).sendVerification(RECIPIENT, 'verify-token');
    }).not.toThrow();
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(errorSpy).toHaveBeenCalledWith('[background] Failed to send verification email:', error);
  });
});
