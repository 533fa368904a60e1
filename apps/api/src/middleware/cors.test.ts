import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { cors } from './cors.js';

function createApp(): Hono<{ Bindings: { FRONTEND_URL?: string } }> {
  const app = new Hono<{ Bindings: { FRONTEND_URL?: string } }>();
  app.use('*', cors());
  app.get('/test', (c) => c.text('ok'));
  return app;
}

describe('cors', () => {
  it('allows the local frontend by default', async () => {
    const res = await createApp().request('/test', {
      headers: { Origin: 'http://localhost:5173' },
    });

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
    expect(res.headers.get('Access-Control-Allow-Credentials')).toBe('true');
  });

  it('allows the configured frontend', async () => {
    const res = await createApp().request(
      '/test',
      { headers: { Origin: 'https://app.leadscout.dev' } },
      { FRONTEND_URL: 'https://app.leadscout.dev' }
    );

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('https://app.leadscout.dev');
  });

  it('exposes Content-Disposition for downloads', async () => {
    const res = await createApp().request('/test', {
      headers: { Origin: 'http://localhost:5173' },
    });

    expect(res.headers.get('Access-Control-Expose-Headers')).toBe('Content-Disposition');
  });
});
