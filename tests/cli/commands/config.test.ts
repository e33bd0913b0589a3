/**
 * Tests for the config command helpers
 */

import { describe, it, expect } from 'vitest';
import { describeProviders } from '../../../src/cli/commands/config.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { setProviderEnabled } from '../../../src/config/providers.js';

describe('describeProviders', () => {
  it('should report status and chain position for every provider', () => {
    expect(describeProviders(DEFAULT_CONFIG, { REPLICATE_API_TOKEN: 'test-secret' })).toEqual([
      { provider: 'replicate', enabled: true, hasCredential: true, isDefault: true, position: 1 },
      { provider: 'openai', enabled: false, hasCredential: false, isDefault: false, position: 2 },
      { provider: 'anthropic', enabled: false, hasCredential: false, isDefault: false, position: 4 },
      { provider: 'gemini', enabled: false, hasCredential: false, isDefault: false, position: 3 },
    ]);
  });

  it('should leave providers outside the chain without a position', () => {
    const config = { ...setProviderEnabled(DEFAULT_CONFIG, 'gemini', true), fallback: { enabled: false, order: [] } };
    const statuses = describeProviders(config, { GEMINI_API_KEY: 'test-secret' });

    expect(statuses.map((status) => status.position)).toEqual([1, null, null, null]);
    expect(statuses.find((status) => status.provider === 'gemini')).toEqual({
      provider: 'gemini',
      enabled: true,
      hasCredential: true,
      isDefault: false,
      position: null,
    });
  });
});
