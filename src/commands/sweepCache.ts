import type { ProcessingResult } from '../types.js';
import { describeError } from '../utils/logger.js';
import { formatCacheDate } from '../utils/reportCache/entries.js';
import { getCacheStore } from '../utils/reportCache/index.js';
import { sweepExpiredEntries } from '../utils/reportCache/sweep.js';
import type { CacheStore } from '../utils/reportCache/types.js';

interface SweepCacheOptions {
  /** Defaults to the file-backed store from config */
  store?: CacheStore;
  /** `YYYY-MM-DD`; entries dated before it are removed (default: today) */
  today?: string;
  onStatus?: (status: string) => void;
}

/**
 * Removes reports from previous days together with their files
 */
export async function sweepCache(options: SweepCacheOptions = {}): Promise<ProcessingResult> {
  const today = options.today ?? formatCacheDate(new Date());

  try {
    const store = options.store ?? (await getCacheStore());
    options.onStatus?.(`Removing reports dated before ${today}...`);

    const sweep = await sweepExpiredEntries(store, today);
    const noun = sweep.removed.length === 1 ? 'report' : 'reports';

    return {
      success: true,
      message:
        sweep.removed.length === 0
          ? 'No expired reports to remove.'
          : `Removed ${sweep.removed.length} expired ${noun}.`,
      sweep,
    };
  } catch (error) {
    const message = describeError(error);
    options.onStatus?.(`✗ Sweep failed: ${message}`);
    return {
      success: false,
      message: `Cache sweep failed: ${message}`,
      error: message,
    };
  }
}
