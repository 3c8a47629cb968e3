import { join } from 'node:path';
import { z } from 'zod';

/**
 * Helper to parse boolean-like environment variables
 */
const booleanString = () =>
  z
    .string()
    .optional()
    .default('false')
    .transform((val) => /^(1|true|yes)$/i.test(val || ''));

/**
 * Helper to parse numeric environment variables with defaults
 */
const numericString = (defaultValue: number) =>
  z
    .string()
    .optional()
    .default(String(defaultValue))
    .transform((val) => {
      if (val === undefined) return defaultValue;
      const parsed = Number(val);
      return Number.isFinite(parsed) ? parsed : defaultValue;
    });

/**
 * Remote ASN listing and CIDR corpus configuration schema
 */
const sourcesConfigSchema = z.object({
  listingBaseUrl: z
    .string()
    .url('ASN_LISTING_BASE_URL must be a valid URL')
    .optional()
    .default('https://ipinfo.io')
    .describe('Base URL of the paginated ASN listing (default: https://ipinfo.io)'),
  cidrBaseUrl: z
    .string()
    .url('CIDR_SOURCE_BASE_URL must be a valid URL')
    .optional()
    .default('https://raw.githubusercontent.com/ipverse/asn-ip/master')
    .describe('Base URL of the per-ASN aggregated CIDR corpus'),
  pageSize: numericString(20)
    .pipe(z.number().int().positive('ASN_PAGE_SIZE must be a positive integer'))
    .describe('ASNs requested per listing page (default: 20)'),
  requestTimeoutMs: numericString(30000)
    .pipe(z.number().positive('REQUEST_TIMEOUT_MS must be positive'))
    .describe('Timeout for a single HTTP request (default: 30000ms)'),
  pageDelayMs: numericString(100)
    .pipe(z.number().nonnegative('PAGE_DELAY_MS cannot be negative'))
    .describe('Pause between listing pages (default: 100ms)'),
});

/**
 * Rate-limit retry configuration schema
 */
const retryConfigSchema = z.object({
  maxAttempts: numericString(3)
    .pipe(z.number().int().min(1, 'RETRY_MAX_ATTEMPTS must be at least 1'))
    .describe('Attempts per listing page when rate limited (default: 3)'),
  delayMs: numericString(5000)
    .pipe(z.number().nonnegative('RETRY_DELAY_MS cannot be negative'))
    .describe('Delay before retrying a rate-limited request (default: 5000ms)'),
  backoffMultiplier: numericString(1)
    .pipe(z.number().min(1, 'RETRY_BACKOFF_MULTIPLIER must be at least 1'))
    .describe('Multiplier applied to the delay per attempt (default: 1, fixed delay)'),
  useJitter: booleanString().describe('Randomize retry delays with full jitter'),
});

/**
 * Storage configuration schema
 */
const storageConfigSchema = z
  .object({
    dataDir: z.string().min(1).optional().default('data').describe('Directory for the cache index'),
    cacheDir: z
      .string()
      .min(1)
      .optional()
      .describe('Directory for report artifacts (default: <dataDir>/ip_cache)'),
    indexMaxEntries: numericString(500)
      .pipe(z.number().int().positive())
      .describe('Entries kept in the in-memory read index (default: 500)'),
  })
  .transform((storage) => ({
    ...storage,
    cacheDir: storage.cacheDir ?? join(storage.dataDir, 'ip_cache'),
  }));

/**
 * Cache replay pacing schema
 */
const replayConfigSchema = z
  .object({
    minSeconds: numericString(5).pipe(z.number().nonnegative()),
    maxSeconds: numericString(25).pipe(z.number().nonnegative()),
  })
  .refine((replay) => replay.maxSeconds >= replay.minSeconds, {
    message: 'REPLAY_MAX_SECONDS must be greater than or equal to REPLAY_MIN_SECONDS',
    path: ['maxSeconds'],
  });

/**
 * Request gate schema
 */
const gateConfigSchema = z.object({
  dailyFreeRequests: numericString(5)
    .pipe(z.number().int().nonnegative())
    .describe('Free report requests per user per day (default: 5)'),
});

/**
 * Daily sweep schema
 */
const sweepConfigSchema = z.object({
  intervalHours: numericString(24)
    .pipe(z.number().positive())
    .describe('Hours between cache sweeps (default: 24)'),
});

/**
 * Application settings schema
 */
const appConfigSchema = z.object({
  verbose: booleanString().describe('Enable verbose logging'),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  sources: sourcesConfigSchema,
  retry: retryConfigSchema,
  storage: storageConfigSchema,
  replay: replayConfigSchema,
  gate: gateConfigSchema,
  sweep: sweepConfigSchema,
  app: appConfigSchema,
});

/**
 * Environment variables schema - maps env vars to config structure
 */
export const envSchema = z.object({
  ASN_LISTING_BASE_URL: z.string().optional(),
  CIDR_SOURCE_BASE_URL: z.string().optional(),
  ASN_PAGE_SIZE: z.string().optional(),
  REQUEST_TIMEOUT_MS: z.string().optional(),
  PAGE_DELAY_MS: z.string().optional(),
  RETRY_MAX_ATTEMPTS: z.string().optional(),
  RETRY_DELAY_MS: z.string().optional(),
  RETRY_BACKOFF_MULTIPLIER: z.string().optional(),
  RETRY_USE_JITTER: z.string().optional(),
  DATA_DIR: z.string().optional(),
  CACHE_DIR: z.string().optional(),
  CACHE_INDEX_MAX_ENTRIES: z.string().optional(),
  REPLAY_MIN_SECONDS: z.string().optional(),
  REPLAY_MAX_SECONDS: z.string().optional(),
  DAILY_FREE_REQUESTS: z.string().optional(),
  SWEEP_INTERVAL_HOURS: z.string().optional(),
  VERBOSE: z.string().optional(),
});

/**
 * TypeScript type for the complete configuration
 */
export type Config = z.infer<typeof configSchema>;

/**
 * TypeScript type for environment variables
 */
export type EnvVars = z.infer<typeof envSchema>;
