import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { securityHeaders } from './security.js';

describe('securityHeaders', () => {
  it('sets the security headers on every response', async () => {
    const app = new Hono();
    app.use('*', securityHeaders());
    app.get('/test', (c) => c.json({ ok: true }));

    const res = await app.request('/test');

    expect(res.headers.get('Content-Security-Policy')).toBe(
      "default-src 'none'; frame-ancestors 'none'"
    );
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
    expect(res.headers.get('X-Frame-Options')).toBe('DENY');
    expect(res.headers.get('Referrer-Policy')).toBe('no-referrer');
    expect(res.headers.get('Cross-Origin-Resource-Policy')).toBe('same-site');
  });

  it('marks CSV downloads as uncacheable', async () => {
    const app = new Hono();
    app.use('*', securityHeaders());
    app.get('/export', (c) => c.body('a,b\r\n', 200, { 'Content-Type': 'text/csv' }));

    const res = await app.request('/export');

    expect(res.headers.get('Cache-Control')).toBe('no-store');
  });
});
