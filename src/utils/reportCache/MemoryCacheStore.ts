import { buildArtifactPath, cacheKeyId, fileExists, lockPlaceholder } from './entries.js';
import type { CacheEntry, CacheStore, CacheStoreOptions, StoredCacheEntry } from './types.js';

/**
 * Cache store held in process memory. Artifacts still live on disk under
 * `cacheDir`; only the metadata is volatile.
 *
 * Every operation is synchronous under the hood, so tryLock needs no queue.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, StoredCacheEntry>();

  constructor(private readonly options: CacheStoreOptions) {}

  async get(country: string, date: string): Promise<CacheEntry | null> {
    const stored = this.entries.get(cacheKeyId(country, date));
    return stored ? { ...stored.entry } : null;
  }

  async put(country: string, date: string, entry: CacheEntry): Promise<void> {
    this.entries.set(cacheKeyId(country, date), { country, date, entry: { ...entry } });
  }

  async tryLock(country: string, date: string): Promise<boolean> {
    const id = cacheKeyId(country, date);
    if (this.entries.get(id)?.entry.locked) {
      return false;
    }
    this.entries.set(id, { country, date, entry: lockPlaceholder() });
    return true;
  }

  async unlock(country: string, date: string): Promise<void> {
    const id = cacheKeyId(country, date);
    const stored = this.entries.get(id);
    if (!stored) {
      return;
    }

    if (!stored.entry.cached) {
      this.entries.delete(id);
      return;
    }
    this.entries.set(id, { country, date, entry: { ...stored.entry, locked: false } });
  }

  async delete(country: string, date: string): Promise<void> {
    this.entries.delete(cacheKeyId(country, date));
  }

  async list(): Promise<StoredCacheEntry[]> {
    return [...this.entries.values()].map(({ country, date, entry }) => ({
      country,
      date,
      entry: { ...entry },
    }));
  }

  artifactPath(country: string, date: string): string {
    return buildArtifactPath(this.options.cacheDir, country, date);
  }

  async artifactExists(entry: CacheEntry): Promise<boolean> {
    return entry.filePath ? fileExists(entry.filePath) : false;
  }

  /** Number of keys currently held */
  get size(): number {
    return this.entries.size;
  }
}
