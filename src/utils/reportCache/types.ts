/**
 * Cache entry for one (country, date) report.
 *
 * A build first stores a placeholder `{ cached: false, locked: true }`; the
 * metadata fields are only present once the build has finished.
 */
export interface CacheEntry {
  /** True once a build completed and the artifact is durable */
  cached: boolean;
  /** True while a build for this key is in flight */
  locked: boolean;
  /** Path of the assembled CIDR list */
  filePath?: string;
  /** ASNs that contributed at least one CIDR block */
  asnCount?: number;
  /** CIDR blocks in the artifact */
  ipRangeCount?: number;
  /** Seconds the real build took */
  buildDuration?: number;
  /** Listing pages that yielded data */
  pagesProcessed?: number;
  /** ISO timestamp of when the build finished */
  createdAt?: string;
}

/**
 * Entry of a finished build with all of its metadata recorded
 */
export interface CompletedCacheEntry extends CacheEntry {
  cached: true;
  locked: false;
  filePath: string;
  asnCount: number;
  ipRangeCount: number;
  buildDuration: number;
  pagesProcessed: number;
  createdAt: string;
}

/**
 * Entry together with its key, as returned by CacheStore.list()
 */
export interface StoredCacheEntry {
  country: string;
  date: string;
  entry: CacheEntry;
}

/**
 * On-disk index layout: country -> date -> entry
 */
export type CacheIndex = Record<string, Record<string, CacheEntry>>;

/**
 * Keyed persistence for report metadata plus the lock primitive that keeps
 * two builds of the same key from running at once.
 */
export interface CacheStore {
  get(country: string, date: string): Promise<CacheEntry | null>;

  /** Full overwrite; readers see either the old or the new entry */
  put(country: string, date: string, entry: CacheEntry): Promise<void>;

  /**
   * Atomically marks the key as being built. Returns false when another
   * build already holds it.
   */
  tryLock(country: string, date: string): Promise<boolean>;

  /**
   * Releases the key. A placeholder that never received metadata is removed,
   * so a failed build leaves no entry behind.
   */
  unlock(country: string, date: string): Promise<void>;

  delete(country: string, date: string): Promise<void>;

  list(): Promise<StoredCacheEntry[]>;

  /** Where the artifact for a key lives (or will live) */
  artifactPath(country: string, date: string): string;

  artifactExists(entry: CacheEntry): Promise<boolean>;
}

/**
 * Options shared by the store implementations
 */
export interface CacheStoreOptions {
  /** Directory holding the report artifacts */
  cacheDir: string;
}

export interface FileCacheStoreOptions extends CacheStoreOptions {
  /** Path of the JSON index file */
  indexPath: string;
  /** Entries kept in the in-memory read index (default: 500) */
  maxIndexEntries?: number;
}
