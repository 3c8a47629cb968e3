import { RateLimitedError } from '../report/errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolveSleep, rejectSleep) => {
    if (signal?.aborted) {
      rejectSleep(new Error('Operation aborted'));
      return;
    }

    let timeout: NodeJS.Timeout;

    const onAbort = () => {
      clearTimeout(timeout);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      rejectSleep(new Error('Operation aborted'));
    };

    timeout = setTimeout(() => {
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      resolveSleep();
    }, ms);

    if (signal) {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

/**
 * Retry policy for rate-limited (HTTP 429) requests
 */
export interface RetryPolicy {
  /** Total attempts including the first request (default: 3) */
  maxAttempts: number;
  /** Delay before the first retry in milliseconds (default: 5000ms) */
  delayMs: number;
  /** Multiplier applied per retry; 1 keeps the delay fixed (default: 1) */
  backoffMultiplier: number;
  /** Upper bound for any single delay (default: 60000ms) */
  maxDelayMs: number;
  /** Whether to use full jitter (default: false) */
  useJitter: boolean;
}

/**
 * Three attempts, five seconds apart
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 5000,
  backoffMultiplier: 1,
  maxDelayMs: 60000,
  useJitter: false,
};

/**
 * Calculates the delay before retry number `retryIndex` (0-indexed).
 *
 * With the default multiplier of 1 this is a fixed delay; larger multipliers
 * give exponential backoff, and `useJitter` picks uniformly in [0, delay].
 */
export function calculateBackoffDelay(retryIndex: number, policy: RetryPolicy): number {
  const { delayMs, maxDelayMs, backoffMultiplier, useJitter } = policy;

  const exponentialDelay = delayMs * Math.pow(backoffMultiplier, retryIndex);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (useJitter) {
    return Math.random() * cappedDelay;
  }

  return cappedDelay;
}

export interface RateLimitRetryOptions {
  policy: RetryPolicy;
  /** URL reported in the RateLimitedError once attempts run out */
  url: string;
  sleep?: SleepFn;
  onRetry?: (attempt: number, delayMs: number) => void;
}

/**
 * Runs `request` until it answers with something other than HTTP 429 or the
 * attempt budget is spent. Only rate limiting is retried here; any other
 * status is handed back for the caller to classify.
 *
 * @throws {RateLimitedError} When every attempt was rate limited
 */
/**
 * Releases the connection behind a response whose body will not be read
 */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

export async function withRateLimitRetry(
  request: () => Promise<Response>,
  { policy, url, sleep: sleepFn = sleep, onRetry }: RateLimitRetryOptions
): Promise<Response> {
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const response = await request();

    if (response.status !== 429) {
      return response;
    }
    await discardBody(response);

    if (attempt === attempts) {
      break;
    }

    const delay = calculateBackoffDelay(attempt - 1, policy);
    onRetry?.(attempt, delay);
    await sleepFn(delay);
  }

  throw new RateLimitedError(url, attempts);
}
