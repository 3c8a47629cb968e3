import { ZodError } from 'zod';
import { configSchema, envSchema, type Config } from './schema.js';
import { ConfigValidationError, ConfigNotLoadedError } from './errors.js';

/**
 * Singleton configuration instance
 */
let configInstance: Config | null = null;

/**
 * Loads and validates configuration from environment variables
 * @throws {ConfigValidationError} If validation fails
 */
export function loadConfig(): Config {
  try {
    const rawEnv = {
      ASN_LISTING_BASE_URL: process.env.ASN_LISTING_BASE_URL,
      CIDR_SOURCE_BASE_URL: process.env.CIDR_SOURCE_BASE_URL,
      ASN_PAGE_SIZE: process.env.ASN_PAGE_SIZE,
      REQUEST_TIMEOUT_MS: process.env.REQUEST_TIMEOUT_MS,
      PAGE_DELAY_MS: process.env.PAGE_DELAY_MS,
      RETRY_MAX_ATTEMPTS: process.env.RETRY_MAX_ATTEMPTS,
      RETRY_DELAY_MS: process.env.RETRY_DELAY_MS,
      RETRY_BACKOFF_MULTIPLIER: process.env.RETRY_BACKOFF_MULTIPLIER,
      RETRY_USE_JITTER: process.env.RETRY_USE_JITTER,
      DATA_DIR: process.env.DATA_DIR,
      CACHE_DIR: process.env.CACHE_DIR,
      CACHE_INDEX_MAX_ENTRIES: process.env.CACHE_INDEX_MAX_ENTRIES,
      REPLAY_MIN_SECONDS: process.env.REPLAY_MIN_SECONDS,
      REPLAY_MAX_SECONDS: process.env.REPLAY_MAX_SECONDS,
      DAILY_FREE_REQUESTS: process.env.DAILY_FREE_REQUESTS,
      SWEEP_INTERVAL_HOURS: process.env.SWEEP_INTERVAL_HOURS,
      VERBOSE: process.env.VERBOSE,
    };

    const validatedEnv = envSchema.parse(rawEnv);

    // Empty strings count as unset so a blank line in .env falls back to the default
    const value = (raw: string | undefined) => (raw && raw.trim().length > 0 ? raw.trim() : undefined);

    const configInput = {
      sources: {
        listingBaseUrl: value(validatedEnv.ASN_LISTING_BASE_URL),
        cidrBaseUrl: value(validatedEnv.CIDR_SOURCE_BASE_URL),
        pageSize: value(validatedEnv.ASN_PAGE_SIZE),
        requestTimeoutMs: value(validatedEnv.REQUEST_TIMEOUT_MS),
        pageDelayMs: value(validatedEnv.PAGE_DELAY_MS),
      },
      retry: {
        maxAttempts: value(validatedEnv.RETRY_MAX_ATTEMPTS),
        delayMs: value(validatedEnv.RETRY_DELAY_MS),
        backoffMultiplier: value(validatedEnv.RETRY_BACKOFF_MULTIPLIER),
        useJitter: value(validatedEnv.RETRY_USE_JITTER),
      },
      storage: {
        dataDir: value(validatedEnv.DATA_DIR),
        cacheDir: value(validatedEnv.CACHE_DIR),
        indexMaxEntries: value(validatedEnv.CACHE_INDEX_MAX_ENTRIES),
      },
      replay: {
        minSeconds: value(validatedEnv.REPLAY_MIN_SECONDS),
        maxSeconds: value(validatedEnv.REPLAY_MAX_SECONDS),
      },
      gate: {
        dailyFreeRequests: value(validatedEnv.DAILY_FREE_REQUESTS),
      },
      sweep: {
        intervalHours: value(validatedEnv.SWEEP_INTERVAL_HOURS),
      },
      app: {
        verbose: value(validatedEnv.VERBOSE),
      },
    };

    configInstance = configSchema.parse(configInput);
    return configInstance;
  } catch (error) {
    if (error instanceof ZodError) {
      throw ConfigValidationError.fromZodError(error);
    }
    throw error;
  }
}

/**
 * Gets the current configuration instance
 * @throws {ConfigNotLoadedError} If config hasn't been loaded yet
 */
export function getConfig(): Config {
  if (!configInstance) {
    throw new ConfigNotLoadedError();
  }
  return configInstance;
}

/**
 * Checks if configuration has been loaded
 */
export function isConfigLoaded(): boolean {
  return configInstance !== null;
}

/**
 * Resets the configuration instance (primarily for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export { ConfigValidationError, ConfigNotLoadedError } from './errors.js';

export type { Config } from './schema.js';
