import { describe, it, expect } from 'vitest';
import { getPlacesClient } from './index.js';

describe('getPlacesClient', () => {
  it('returns the mock client in development without a key', () => {
    expect(getPlacesClient({ NODE_ENV: 'development' }).isMock).toBe(true);
  });

  it('returns the mock client in CI without a key', () => {
    expect(getPlacesClient({ NODE_ENV: 'test', CI: 'true' }).isMock).toBe(true);
  });

  it('returns the Google client when a key is set', () => {
    const client = getPlacesClient({ NODE_ENV: 'development', GOOGLE_MAPS_API_KEY: 'test-maps-key' });
    expect(client.isMock).toBe(false);
  });

  it('throws in production without a key', () => {
    expect(() => getPlacesClient({ NODE_ENV: 'production' })).toThrow(
      'GOOGLE_MAPS_API_KEY required in production'
    );
  });
});
