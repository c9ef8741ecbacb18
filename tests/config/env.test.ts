import { describe, it, expect, afterEach } from 'vitest';
import { getEnv, loadConfig, resetEnv } from '../../src/config/env.js';
import { InfrastructureError } from '../../src/exception/errors.js';

describe('loadConfig', () => {
  afterEach(() => {
    resetEnv();
  });

  it('applies defaults to an empty environment', () => {
    const env = loadConfig({});
    expect(env.HEADLESS).toBe(true);
    expect(env.KEEP_BROWSER_OPEN).toBe(false);
    expect(env.ACTION_RETRIES).toBe(3);
    expect(env.SETTLE_DELAY_MS).toBe(1500);
    expect(env.RUNS_DIR).toBe('runs');
    expect(env.STORAGE_BASE_URL).toBeUndefined();
  });

  it('coerces numbers and boolean flags', () => {
    const env = loadConfig({ HEADLESS: '0', ACTION_RETRIES: '5', DOWNLOAD_TIMEOUT_MS: '1000' });
    expect(env.HEADLESS).toBe(false);
    expect(env.ACTION_RETRIES).toBe(5);
    expect(env.DOWNLOAD_TIMEOUT_MS).toBe(1000);
  });

  it('names every invalid key', () => {
    expect(() => loadConfig({ HEADLESS: 'maybe', STORAGE_BASE_URL: 'not a url' })).toThrow(InfrastructureError);
    expect(() => loadConfig({ ACTION_RETRIES: '99' })).toThrow(/ACTION_RETRIES/);
  });

  it('caches the process configuration until reset', () => {
    const first = getEnv();
    expect(getEnv()).toBe(first);
    resetEnv();
    expect(getEnv()).not.toBe(first);
  });
});
