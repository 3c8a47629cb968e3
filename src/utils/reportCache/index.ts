import { join } from 'node:path';
import { getConfig } from '../../config/index.js';
import { FileCacheStore } from './FileCacheStore.js';

/**
 * Singleton store instance
 */
let storeInstance: FileCacheStore | null = null;
let initializationPromise: Promise<void> | null = null;

/**
 * Get or create the file-backed store described by the loaded config
 *
 * @returns Initialized store instance
 */
export async function getCacheStore(): Promise<FileCacheStore> {
  if (storeInstance) {
    if (initializationPromise) {
      await initializationPromise;
    }
    return storeInstance;
  }

  const { storage } = getConfig();
  storeInstance = new FileCacheStore({
    indexPath: join(storage.dataDir, 'ip_files.json'),
    cacheDir: storage.cacheDir,
    maxIndexEntries: storage.indexMaxEntries,
  });

  initializationPromise = storeInstance.initialize();
  try {
    await initializationPromise;
  } catch (error) {
    storeInstance = null;
    throw error;
  } finally {
    initializationPromise = null;
  }

  return storeInstance;
}

/**
 * Forget the singleton (primarily for testing)
 */
export function resetCacheStore(): void {
  storeInstance = null;
  initializationPromise = null;
}

export { FileCacheStore } from './FileCacheStore.js';
export { MemoryCacheStore } from './MemoryCacheStore.js';
export { sweepExpiredEntries, startDailySweep } from './sweep.js';
export type { SweepResult, DailySweepOptions } from './sweep.js';
export {
  buildArtifactPath,
  countriesCachedOn,
  formatCacheDate,
  isCacheDate,
  isCompletedEntry,
} from './entries.js';
export type {
  CacheEntry,
  CacheIndex,
  CacheStore,
  CacheStoreOptions,
  CompletedCacheEntry,
  FileCacheStoreOptions,
  StoredCacheEntry,
} from './types.js';
