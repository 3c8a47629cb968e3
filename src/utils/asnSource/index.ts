import { getConfig } from '../../config/index.js';
import { HttpAsnSource } from './HttpAsnSource.js';
import { DEFAULT_RETRY_POLICY } from './retry.js';

/**
 * Builds the HTTP source from the loaded configuration
 */
export function createAsnSourceFromConfig(): HttpAsnSource {
  const config = getConfig();

  return new HttpAsnSource({
    listingBaseUrl: config.sources.listingBaseUrl,
    cidrBaseUrl: config.sources.cidrBaseUrl,
    pageSize: config.sources.pageSize,
    requestTimeoutMs: config.sources.requestTimeoutMs,
    retryPolicy: {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: config.retry.maxAttempts,
      delayMs: config.retry.delayMs,
      backoffMultiplier: config.retry.backoffMultiplier,
      useJitter: config.retry.useJitter,
    },
  });
}

export {
  HttpAsnSource,
  CIDR_HEADER_LINES,
  DEFAULT_PAGE_SIZE,
  isUsableAsn,
  parseAsnListing,
  stripCidrHeader,
} from './HttpAsnSource.js';
export type { HttpAsnSourceOptions } from './HttpAsnSource.js';
export { DEFAULT_RETRY_POLICY, calculateBackoffDelay, sleep, withRateLimitRetry } from './retry.js';
export type { RetryPolicy, SleepFn, RateLimitRetryOptions } from './retry.js';
export type { AsnPage, AsnRecord, AsnSource } from './types.js';
