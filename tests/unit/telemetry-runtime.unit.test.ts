import { describe, expect, it } from 'vitest';

import { isTelemetryEnabled } from '../../src/telemetry/runtime.js';

describe('isTelemetryEnabled', () => {
  it('starts only when enabled outside of tests', () => {
    expect(isTelemetryEnabled({ NODE_ENV: 'production', OTEL_ENABLED: true })).toBe(true);
    expect(isTelemetryEnabled({ NODE_ENV: 'development', OTEL_ENABLED: false })).toBe(false);
    expect(isTelemetryEnabled({ NODE_ENV: 'test', OTEL_ENABLED: true })).toBe(false);
  });
});
