import { describe, it, expect } from 'vitest';
import { verificationEmail } from './verification.js';

describe('verificationEmail', () => {
  const verificationUrl = 'http://localhost:5173/verify-email?token=abc123';

  it('links to the verification url', () => {
    const result = verificationEmail({ verificationUrl });

    expect(result.subject).toBe('Verify your LeadScout email');
    expect(result.html).toContain(`href="${verificationUrl}"`);
    expect(result.text).toContain(verificationUrl);
  });

  it('greets the user by name', () => {
    expect(verificationEmail({ userName: 'Ada', verificationUrl }).text).toContain('Hi Ada,');
  });

  it('uses a generic greeting without a name', () => {
    const result = verificationEmail({ userName: null, verificationUrl });

    expect(result.text).toContain('\nHi,\n');
    expect(result.html).not.toContain('null');
  });

  it('states the default expiry', () => {
    expect(verificationEmail({ verificationUrl }).text).toContain('This link expires in 24 hours.');
  });

  it('escapes the user name in html', () => {
    const result = verificationEmail({ userName: '<script>', verificationUrl });

    expect(result.html).toContain('Hi &lt;script&gt;,');
  });
});
