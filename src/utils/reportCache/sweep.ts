import { rm } from 'node:fs/promises';
import { createLogger, describeError, type Logger } from '../logger.js';
import { PersistenceFailureError } from '../report/errors.js';
import { formatCacheDate } from './entries.js';
import type { CacheStore } from './types.js';

export interface SweepResult {
  /** `COUNTRY/date` of every entry removed */
  removed: string[];
  artifactsDeleted: number;
}

export interface DailySweepOptions {
  intervalMs: number;
  /** Returns the current time; defaults to `new Date()` */
  clock?: () => Date;
  logger?: Logger;
  /** Called after each completed run */
  onSweep?: (result: SweepResult) => void;
}

/**
 * Deletes every entry dated before `today` and its artifact file.
 * Dates compare as `YYYY-MM-DD` strings.
 */
export async function sweepExpiredEntries(
  store: CacheStore,
  today: string,
  logger: Logger = createLogger('sweep')
): Promise<SweepResult> {
  const result: SweepResult = { removed: [], artifactsDeleted: 0 };
  const stored = await store.list();

  for (const { country, date, entry } of stored) {
    if (date >= today) {
      continue;
    }

    if (entry.filePath) {
      try {
        await rm(entry.filePath, { force: true });
        result.artifactsDeleted++;
      } catch (error) {
        throw new PersistenceFailureError('delete artifact', entry.filePath, { cause: error });
      }
    }

    await store.delete(country, date);
    result.removed.push(`${country}/${date}`);
    logger.debug(`Removed expired entry ${country}/${date}`);
  }

  if (result.removed.length > 0) {
    logger.info(`Swept ${result.removed.length} expired cache entries`);
  }

  return result;
}

/**
 * Sweeps once right away and then on a fixed interval. The timer is unref'd
 * so it never keeps the process alive. Returns a function that stops it.
 */
export function startDailySweep(store: CacheStore, options: DailySweepOptions): () => void {
  const clock = options.clock ?? (() => new Date());
  const logger = options.logger ?? createLogger('sweep');
  let running = false;

  const run = async (): Promise<void> => {
    if (running) {
      return;
    }
    running = true;
    try {
      const result = await sweepExpiredEntries(store, formatCacheDate(clock()), logger);
      options.onSweep?.(result);
    } catch (error) {
      logger.error(`Cache sweep failed: ${describeError(error)}`);
    } finally {
      running = false;
    }
  };

  void run();
  const timer = setInterval(() => {
    void run();
  }, options.intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
