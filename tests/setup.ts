/**
 * Global test setup file
 * Runs before all tests to configure the testing environment
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi, beforeEach, afterEach } from 'vitest';

// Keep pacing out of the tests and any stray writes out of the working tree
process.env.NODE_ENV = 'test';
process.env.PAGE_DELAY_MS = '0';
process.env.RETRY_DELAY_MS = '0';
process.env.DATA_DIR = join(tmpdir(), `ipranges-test-${process.pid}`);
process.env.ASN_LISTING_BASE_URL = 'https://listing.test';
process.env.CIDR_SOURCE_BASE_URL = 'https://cidr.test/corpus';
delete process.env.CACHE_DIR;
delete process.env.VERBOSE;

import { loadConfig, resetConfig } from '../src/config/index.js';
loadConfig();

// Suppress console output by default
// Tests can inspect these mocks when they need to assert on logging
global.console = {
  ...console,
  log: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  info: vi.fn(),
};

// Global test utilities
export const waitFor = async (
  callback: () => boolean | Promise<boolean>,
  options: { timeout?: number; interval?: number } = {}
): Promise<void> => {
  const { timeout = 5000, interval = 20 } = options;
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await callback()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, interval));
  }

  throw new Error(`waitFor timeout after ${timeout}ms`);
};

beforeEach(() => {
  vi.clearAllMocks();

  // Reload config for each test so env changes made by a test do not leak
  resetConfig();
  loadConfig();
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
  vi.clearAllTimers();
  vi.useRealTimers();
});
