import { LRUCache } from 'lru-cache';
import { randomBytes } from 'node:crypto';
import { promises as fsPromises } from 'node:fs';
import { dirname } from 'node:path';
import { createLogger, type Logger } from '../logger.js';
import { PersistenceFailureError } from '../report/errors.js';
import {
  buildArtifactPath,
  cacheEntrySchema,
  cacheKeyId,
  fileExists,
  isCacheDate,
  lockPlaceholder,
} from './entries.js';
import type { CacheEntry, CacheIndex, CacheStore, FileCacheStoreOptions, StoredCacheEntry } from './types.js';

interface Mutation<T> {
  value: T;
  /** Keys whose entry changed; null value means the key was removed */
  changes: Array<{ country: string; date: string; entry: CacheEntry | null }>;
}

/**
 * Cache store persisted as a single JSON index file plus one artifact file
 * per key.
 *
 * - Index writes go to a temp file that is renamed over the index, so a
 *   reader never sees a half-written file
 * - All mutations run one at a time through an in-process queue, which is
 *   what makes tryLock a compare-and-swap
 * - Reads are served from an LRU index that mutations keep current
 */
export class FileCacheStore implements CacheStore {
  private readonly entries: LRUCache<string, CacheEntry>;
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();
  /** Bumped by every mutation that rewrote the index */
  private generation = 0;
  private initialized = false;

  constructor(
    private readonly options: FileCacheStoreOptions,
    logger?: Logger
  ) {
    this.entries = new LRUCache<string, CacheEntry>({
      max: options.maxIndexEntries ?? 500,
    });
    this.logger = logger ?? createLogger('cache');
  }

  /**
   * Create the index and artifact directories
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      await fsPromises.mkdir(dirname(this.options.indexPath), { recursive: true });
      await fsPromises.mkdir(this.options.cacheDir, { recursive: true });
    } catch (error) {
      throw new PersistenceFailureError('create cache directories for', this.options.cacheDir, {
        cause: error,
      });
    }
    this.initialized = true;
  }

  async get(country: string, date: string): Promise<CacheEntry | null> {
    const id = cacheKeyId(country, date);
    const hot = this.entries.get(id);
    if (hot) {
      return { ...hot };
    }

    const seen = this.generation;
    const index = await this.readIndex();
    const entry = index[country]?.[date];
    if (!entry) {
      return null;
    }

    // A mutation that finished during the read may already have replaced it
    if (seen === this.generation) {
      this.entries.set(id, entry);
    }
    return { ...entry };
  }

  async put(country: string, date: string, entry: CacheEntry): Promise<void> {
    await this.mutate((index) => {
      setEntry(index, country, date, { ...entry });
      return { value: undefined, changes: [{ country, date, entry: { ...entry } }] };
    });
  }

  async tryLock(country: string, date: string): Promise<boolean> {
    return this.mutate((index) => {
      if (index[country]?.[date]?.locked) {
        return { value: false, changes: [] };
      }

      const placeholder = lockPlaceholder();
      setEntry(index, country, date, placeholder);
      return { value: true, changes: [{ country, date, entry: placeholder }] };
    });
  }

  async unlock(country: string, date: string): Promise<void> {
    await this.mutate((index) => {
      const current = index[country]?.[date];
      if (!current) {
        return { value: undefined, changes: [] };
      }

      if (!current.cached) {
        removeEntry(index, country, date);
        return { value: undefined, changes: [{ country, date, entry: null }] };
      }

      const unlocked = { ...current, locked: false };
      setEntry(index, country, date, unlocked);
      return { value: undefined, changes: [{ country, date, entry: unlocked }] };
    });
  }

  async delete(country: string, date: string): Promise<void> {
    await this.mutate((index) => {
      if (!index[country]?.[date]) {
        return { value: undefined, changes: [] };
      }
      removeEntry(index, country, date);
      return { value: undefined, changes: [{ country, date, entry: null }] };
    });
  }

  async list(): Promise<StoredCacheEntry[]> {
    const index = await this.readIndex();
    const stored: StoredCacheEntry[] = [];

    for (const [country, dates] of Object.entries(index)) {
      for (const [date, entry] of Object.entries(dates)) {
        stored.push({ country, date, entry: { ...entry } });
      }
    }

    return stored;
  }

  artifactPath(country: string, date: string): string {
    return buildArtifactPath(this.options.cacheDir, country, date);
  }

  async artifactExists(entry: CacheEntry): Promise<boolean> {
    return entry.filePath ? fileExists(entry.filePath) : false;
  }

  /**
   * Runs a read-modify-write of the index after every earlier mutation has
   * settled. The index is only rewritten when something changed.
   */
  private mutate<T>(apply: (index: CacheIndex) => Mutation<T>): Promise<T> {
    const run = this.queue.then(async () => {
      await this.initialize();
      const index = await this.readIndex();
      const { value, changes } = apply(index);

      if (changes.length > 0) {
        await this.writeIndex(index);
        this.generation += 1;
        for (const change of changes) {
          const id = cacheKeyId(change.country, change.date);
          if (change.entry) {
            this.entries.set(id, change.entry);
          } else {
            this.entries.delete(id);
          }
        }
      }

      return value;
    });

    // Keep the queue moving after a failed mutation; the failure still
    // reaches the caller through `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  private async readIndex(): Promise<CacheIndex> {
    let raw: string;
    try {
      raw = await fsPromises.readFile(this.options.indexPath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return {};
      }
      throw new PersistenceFailureError('read cache index', this.options.indexPath, { cause: error });
    }

    if (raw.trim().length === 0) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceFailureError('parse cache index', this.options.indexPath, { cause: error });
    }

    return this.validateIndex(parsed);
  }

  /**
   * Keeps every well-formed entry and drops the rest with a warning
   */
  private validateIndex(parsed: unknown): CacheIndex {
    const index: CacheIndex = {};
    if (!isRecord(parsed)) {
      this.logger.warn(`Ignoring cache index with unexpected shape at ${this.options.indexPath}`);
      return index;
    }

    for (const [country, dates] of Object.entries(parsed)) {
      if (!isRecord(dates)) {
        this.logger.warn(`Ignoring malformed cache index section for ${country}`);
        continue;
      }

      for (const [date, value] of Object.entries(dates)) {
        const result = cacheEntrySchema.safeParse(value);
        if (!isCacheDate(date) || !result.success) {
          this.logger.warn(`Ignoring malformed cache entry ${country}/${date}`);
          continue;
        }
        setEntry(index, country, date, result.data);
      }
    }

    return index;
  }

  private async writeIndex(index: CacheIndex): Promise<void> {
    const tempPath = `${this.options.indexPath}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await fsPromises.writeFile(tempPath, JSON.stringify(index, null, 2), 'utf8');
      await fsPromises.rename(tempPath, this.options.indexPath);
    } catch (error) {
      await fsPromises.rm(tempPath, { force: true });
      throw new PersistenceFailureError('write cache index', this.options.indexPath, { cause: error });
    }
  }
}

function setEntry(index: CacheIndex, country: string, date: string, entry: CacheEntry): void {
  const dates = index[country] ?? {};
  dates[date] = entry;
  index[country] = dates;
}

function removeEntry(index: CacheIndex, country: string, date: string): void {
  const dates = index[country];
  if (!dates) {
    return;
  }
  delete dates[date];
  if (Object.keys(dates).length === 0) {
    delete index[country];
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
