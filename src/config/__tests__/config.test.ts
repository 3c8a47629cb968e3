import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ConfigNotLoadedError,
  ConfigValidationError,
  getConfig,
  isConfigLoaded,
  loadConfig,
  resetConfig,
} from '../index.js';

describe('loadConfig', () => {
  beforeEach(() => {
    resetConfig();
  });

  it('applies defaults for unset variables', () => {
    vi.stubEnv('ASN_LISTING_BASE_URL', '');
    vi.stubEnv('PAGE_DELAY_MS', '');
    vi.stubEnv('RETRY_DELAY_MS', '');
    vi.stubEnv('DATA_DIR', '');

    const config = loadConfig();

    expect(config.sources.listingBaseUrl).toBe('https://ipinfo.io');
    expect(config.sources.pageSize).toBe(20);
    expect(config.sources.pageDelayMs).toBe(100);
    expect(config.sources.requestTimeoutMs).toBe(30000);
    expect(config.retry).toEqual({ maxAttempts: 3, delayMs: 5000, backoffMultiplier: 1, useJitter: false });
    expect(config.storage.dataDir).toBe('data');
    expect(config.storage.cacheDir).toBe(join('data', 'ip_cache'));
    expect(config.replay).toEqual({ minSeconds: 5, maxSeconds: 25 });
    expect(config.gate.dailyFreeRequests).toBe(5);
    expect(config.sweep.intervalHours).toBe(24);
    expect(config.app.verbose).toBe(false);
  });

  it('reads overrides from the environment', () => {
    vi.stubEnv('DATA_DIR', '/srv/ipranges');
    vi.stubEnv('CACHE_DIR', '/srv/reports');
    vi.stubEnv('RETRY_MAX_ATTEMPTS', '5');
    vi.stubEnv('RETRY_USE_JITTER', 'yes');
    vi.stubEnv('REPLAY_MIN_SECONDS', '1');
    vi.stubEnv('REPLAY_MAX_SECONDS', '2');
    vi.stubEnv('VERBOSE', 'true');

    const config = loadConfig();

    expect(config.storage.dataDir).toBe('/srv/ipranges');
    expect(config.storage.cacheDir).toBe('/srv/reports');
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.retry.useJitter).toBe(true);
    expect(config.replay).toEqual({ minSeconds: 1, maxSeconds: 2 });
    expect(config.app.verbose).toBe(true);
  });

  it('derives the artifact directory from DATA_DIR', () => {
    vi.stubEnv('DATA_DIR', '/srv/ipranges');

    expect(loadConfig().storage.cacheDir).toBe(join('/srv/ipranges', 'ip_cache'));
  });

  it('rejects a page size of zero', () => {
    vi.stubEnv('ASN_PAGE_SIZE', '0');

    expect(() => loadConfig()).toThrow(ConfigValidationError);
    try {
      loadConfig();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.invalidPaths).toEqual(['sources.pageSize']);
        expect(error.message).toContain('ASN_PAGE_SIZE must be a positive integer');
      }
    }
  });

  it('rejects a replay window whose maximum is below its minimum', () => {
    vi.stubEnv('REPLAY_MIN_SECONDS', '30');
    vi.stubEnv('REPLAY_MAX_SECONDS', '10');

    try {
      loadConfig();
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.invalidPaths).toEqual(['replay.maxSeconds']);
      }
    }
  });

  it('rejects a listing URL that is not a URL', () => {
    vi.stubEnv('ASN_LISTING_BASE_URL', 'not a url');

    expect(() => loadConfig()).toThrow('ASN_LISTING_BASE_URL must be a valid URL');
  });
});

describe('getConfig', () => {
  it('throws before the configuration is loaded', () => {
    resetConfig();

    expect(isConfigLoaded()).toBe(false);
    expect(() => getConfig()).toThrow(ConfigNotLoadedError);
  });

  it('returns the loaded instance', () => {
    resetConfig();
    const loaded = loadConfig();

    expect(isConfigLoaded()).toBe(true);
    expect(getConfig()).toBe(loaded);
  });
});
