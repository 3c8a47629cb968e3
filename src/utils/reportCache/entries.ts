import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { CacheEntry, CompletedCacheEntry, StoredCacheEntry } from './types.js';

export const cacheEntrySchema = z.object({
  cached: z.boolean().default(false),
  locked: z.boolean().default(false),
  filePath: z.string().min(1).optional(),
  asnCount: z.number().int().nonnegative().optional(),
  ipRangeCount: z.number().int().nonnegative().optional(),
  buildDuration: z.number().nonnegative().optional(),
  pagesProcessed: z.number().int().nonnegative().optional(),
  createdAt: z.string().optional(),
});

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar date of a cache key in local time, `YYYY-MM-DD`
 */
export function formatCacheDate(date: Date): string {
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

export function isCacheDate(value: string): boolean {
  return DATE_PATTERN.test(value);
}

export function cacheKeyId(country: string, date: string): string {
  return `${country}|${date}`;
}

export function buildArtifactPath(cacheDir: string, country: string, date: string): string {
  return join(cacheDir, `ips-${country}-${date}.txt`);
}

/**
 * Entries written by a finished build carry every metadata field; anything
 * less is treated as a cache miss.
 */
export function isCompletedEntry(entry: CacheEntry): entry is CompletedCacheEntry {
  return (
    entry.cached &&
    !entry.locked &&
    typeof entry.filePath === 'string' &&
    typeof entry.asnCount === 'number' &&
    typeof entry.ipRangeCount === 'number' &&
    typeof entry.buildDuration === 'number' &&
    typeof entry.pagesProcessed === 'number' &&
    typeof entry.createdAt === 'string'
  );
}

export function lockPlaceholder(): CacheEntry {
  return { cached: false, locked: true };
}

/**
 * Countries with a finished report for `date`, sorted
 */
export function countriesCachedOn(stored: StoredCacheEntry[], date: string): string[] {
  const countries = stored
    .filter(({ date: entryDate, entry }) => entryDate === date && isCompletedEntry(entry))
    .map(({ country }) => country);
  return [...new Set(countries)].sort();
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
