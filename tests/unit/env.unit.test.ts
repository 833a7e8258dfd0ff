import { describe, expect, it } from 'vitest';

import { getEnv } from '../../src/config/env.js';

describe('getEnv', () => {
  it('reads boolean flags from strings and booleans', () => {
    expect(getEnv({ SEED_SAMPLE_DATA: 'false' }).SEED_SAMPLE_DATA).toBe(false);
    expect(getEnv({ SEED_SAMPLE_DATA: true }).SEED_SAMPLE_DATA).toBe(true);
    expect(getEnv({ OTEL_ENABLED: 'true' }).OTEL_ENABLED).toBe(true);
  });

  it('coerces the port and rejects a malformed database url', () => {
    expect(getEnv({ PORT: '8080' }).PORT).toBe(8080);
    expect(() => getEnv({ DATABASE_URL: 'not a url' })).toThrow();
  });
});
