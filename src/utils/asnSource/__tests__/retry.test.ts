import { describe, it, expect, vi } from 'vitest';
import { RateLimitedError } from '../../report/errors.js';
import { DEFAULT_RETRY_POLICY, calculateBackoffDelay, sleep, withRateLimitRetry, type RetryPolicy } from '../retry.js';

const noSleep = () => vi.fn(async (_ms: number) => undefined);

describe('calculateBackoffDelay', () => {
  it('keeps the delay fixed with the default policy', () => {
    expect(calculateBackoffDelay(0, DEFAULT_RETRY_POLICY)).toBe(5000);
    expect(calculateBackoffDelay(1, DEFAULT_RETRY_POLICY)).toBe(5000);
    expect(calculateBackoffDelay(2, DEFAULT_RETRY_POLICY)).toBe(5000);
  });

  it('grows exponentially and caps at maxDelayMs', () => {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, delayMs: 1000, backoffMultiplier: 2, maxDelayMs: 10000 };

    expect(calculateBackoffDelay(0, policy)).toBe(1000);
    expect(calculateBackoffDelay(3, policy)).toBe(8000);
    expect(calculateBackoffDelay(4, policy)).toBe(10000);
  });

  it('scales the delay by a random factor with jitter', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);

    expect(calculateBackoffDelay(0, { ...DEFAULT_RETRY_POLICY, useJitter: true })).toBe(2500);
  });
});

describe('withRateLimitRetry', () => {
  it('retries 429 responses and returns the first other response', async () => {
    const request = vi
      .fn<() => Promise<Response>>()
      .mockResolvedValueOnce(new Response(null, { status: 429 }))
      .mockResolvedValueOnce(new Response(null, { status: 429 }))
      .mockResolvedValueOnce(new Response('[]', { status: 200 }));
    const sleepFn = noSleep();
    const onRetry = vi.fn();

    const response = await withRateLimitRetry(request, {
      policy: DEFAULT_RETRY_POLICY,
      url: 'https://listing.test/page',
      sleep: sleepFn,
      onRetry,
    });

    expect(response.status).toBe(200);
    expect(request).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([5000, 5000]);
    expect(onRetry.mock.calls).toEqual([
      [1, 5000],
      [2, 5000],
    ]);
  });

  it('throws RateLimitedError once every attempt was rate limited', async () => {
    const request = vi.fn(async () => new Response(null, { status: 429 }));
    const sleepFn = noSleep();

    const attempt = withRateLimitRetry(request, {
      policy: DEFAULT_RETRY_POLICY,
      url: 'https://listing.test/page',
      sleep: sleepFn,
    });

    await expect(attempt).rejects.toBeInstanceOf(RateLimitedError);
    await expect(attempt).rejects.toMatchObject({ kind: 'RateLimited', attempts: 3 });
    expect(request).toHaveBeenCalledTimes(3);
    // No pause after the final attempt
    expect(sleepFn).toHaveBeenCalledTimes(2);
  });

  it('releases the body of every rate-limited response', async () => {
    const limited = [new Response('slow down', { status: 429 }), new Response('slow down', { status: 429 })];
    const ok = new Response('[]', { status: 200 });
    const request = vi
      .fn<() => Promise<Response>>()
      .mockResolvedValueOnce(limited[0] ?? ok)
      .mockResolvedValueOnce(limited[1] ?? ok)
      .mockResolvedValueOnce(ok);

    const response = await withRateLimitRetry(request, {
      policy: DEFAULT_RETRY_POLICY,
      url: 'https://listing.test/page',
      sleep: noSleep(),
    });

    expect(limited.map((entry) => entry.bodyUsed)).toEqual([true, true]);
    expect(response.bodyUsed).toBe(false);
    await expect(response.text()).resolves.toBe('[]');
  });

  it('hands other statuses back without retrying', async () => {
    const request = vi.fn(async () => new Response(null, { status: 503 }));
    const sleepFn = noSleep();

    const response = await withRateLimitRetry(request, {
      policy: DEFAULT_RETRY_POLICY,
      url: 'https://listing.test/page',
      sleep: sleepFn,
    });

    expect(response.status).toBe(503);
    expect(request).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('rejects when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(1000, controller.signal)).rejects.toThrow('Operation aborted');
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const pending = sleep(500);

    await vi.advanceTimersByTimeAsync(500);

    await expect(pending).resolves.toBeUndefined();
  });
});
