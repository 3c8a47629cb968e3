import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { buildArtifactPath, countriesCachedOn, formatCacheDate, isCacheDate, isCompletedEntry } from '../entries.js';
import { createCompletedEntry } from '../../../../tests/helpers/mockFactories.js';

describe('formatCacheDate', () => {
  it('formats the local calendar date with zero padding', () => {
    expect(formatCacheDate(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05');
    expect(formatCacheDate(new Date(2024, 11, 31, 0, 0))).toBe('2024-12-31');
  });
});

describe('isCacheDate', () => {
  it('accepts YYYY-MM-DD only', () => {
    expect(isCacheDate('2024-03-10')).toBe(true);
    expect(isCacheDate('2024-3-10')).toBe(false);
    expect(isCacheDate('yesterday')).toBe(false);
  });
});

describe('buildArtifactPath', () => {
  it('names the file after country and date', () => {
    expect(buildArtifactPath('/var/cache', 'DE', '2024-03-10')).toBe(join('/var/cache', 'ips-DE-2024-03-10.txt'));
  });
});

describe('isCompletedEntry', () => {
  it('requires every metadata field and no lock', () => {
    const entry = createCompletedEntry('/de.txt');

    expect(isCompletedEntry(entry)).toBe(true);
    expect(isCompletedEntry({ ...entry, locked: true })).toBe(false);
    expect(isCompletedEntry({ cached: true, locked: false, filePath: '/de.txt' })).toBe(false);
    expect(isCompletedEntry({ cached: false, locked: true })).toBe(false);
  });
});

describe('countriesCachedOn', () => {
  it('lists countries with a finished report for the date', () => {
    const stored = [
      { country: 'FR', date: '2024-03-10', entry: createCompletedEntry('/cache/ips-FR-2024-03-10.txt') },
      { country: 'DE', date: '2024-03-10', entry: createCompletedEntry('/cache/ips-DE-2024-03-10.txt') },
      { country: 'NL', date: '2024-03-10', entry: { cached: false, locked: true } },
      { country: 'IT', date: '2024-03-09', entry: createCompletedEntry('/cache/ips-IT-2024-03-09.txt') },
    ];

    expect(countriesCachedOn(stored, '2024-03-10')).toEqual(['DE', 'FR']);
    expect(countriesCachedOn(stored, '2024-03-11')).toEqual([]);
  });
});
