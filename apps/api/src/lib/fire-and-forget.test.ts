import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fireAndForget } from './fire-and-forget.js';

describe('fireAndForget', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('does not throw when the promise resolves', () => {
    expect(() => {
      fireAndForget(Promise.resolve('sent'), 'send email');
    }).not.toThrow();
  });

  it('logs the error with its context when the promise rejects', async () => {
    const error = new Error('SMTP down');

    fireAndForget(Promise.reject(error), 'send verification email');
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(console.error).toHaveBeenCalledWith('[background] Failed to send verification email:', error);
  });

  it('does not log when the promise resolves', async () => {
    fireAndForget(Promise.resolve(), 'send email');
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(console.error).not.toHaveBeenCalled();
  });
});
