import { describe, it, expect } from 'vitest';
import { loadSettings } from '../config/settings.js';

describe('loadSettings', () => {
  it('falls back to defaults on an empty environment', () => {
    expect(loadSettings({})).toEqual({ logLevel: 'info', quiet: false, logSteps: true, envPrefix: 'STEPLINE__' });
  });

  it('reads levels, flags and the env prefix', () => {
    expect(loadSettings({ LOG_LEVEL: 'DEBUG', QUIET: 'true', LOG_STEPS: '0', STEPLINE_ENV_PREFIX: 'APP__' })).toEqual({
      logLevel: 'debug',
      quiet: true,
      logSteps: false,
      envPrefix: 'APP__',
    });
  });

  it('ignores an unknown log level', () => {
    expect(loadSettings({ LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
  });
});
