import { rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { sleep as defaultSleep, type SleepFn } from '../asnSource/retry.js';
import { isUsableAsn } from '../asnSource/HttpAsnSource.js';
import type { AsnPage, AsnSource } from '../asnSource/types.js';
import { createLogger, describeError, type Logger } from '../logger.js';
import { ArtifactAccumulator } from '../reportArtifact/ArtifactAccumulator.js';
import { formatCacheDate, isCompletedEntry } from '../reportCache/entries.js';
import type { CacheStore, CompletedCacheEntry } from '../reportCache/types.js';
import {
  AlreadyBuildingError,
  InvalidCountryError,
  PersistenceFailureError,
  isReportError,
  toReportError,
  type ReportError,
} from './errors.js';
import {
  BuildProgress,
  planReplay,
  replayProgress,
  type ProgressSink,
  type ProgressTotals,
  type ReplayPacing,
} from './ProgressReporter.js';

export type BuildState = 'Idle' | 'CheckingCache' | 'ReplayingCache' | 'Building' | 'Done' | 'Failed';

/**
 * A finished report, either freshly built or served from the cache
 */
export interface ReportArtifact {
  country: string;
  date: string;
  artifactPath: string;
  totalAsns: number;
  totalIpRanges: number;
  pagesProcessed: number;
  elapsedSeconds: number;
  source: 'fresh' | 'cache';
}

export type ReportResult = { ok: true; report: ReportArtifact } | { ok: false; error: ReportError };

export interface ReportBuilderOptions {
  store: CacheStore;
  source: AsnSource;
  /** Pause between listing pages (default: 100ms) */
  pageDelayMs?: number;
  /** Pacing of cache replays (default: 5 to 25 seconds) */
  replay?: ReplayPacing;
  sleep?: SleepFn;
  /** Current time; drives the cache date and elapsed times */
  clock?: () => Date;
  /** Bytes a report may hold in memory before spilling to disk */
  memoryThreshold?: number;
  logger?: Logger;
}

export interface BuildRequest {
  /** Normalized 2-letter country code */
  country: string;
  /** Cache date override, `YYYY-MM-DD`; defaults to today */
  date?: string;
  sink?: ProgressSink;
  onStateChange?: (state: BuildState) => void;
}

const DEFAULT_PAGE_DELAY_MS = 100;

const DEFAULT_REPLAY: ReplayPacing = { minSeconds: 5, maxSeconds: 25 };

/**
 * Produces the IP-range report for a country and day.
 *
 * A completed cache entry is replayed with synthetic progress and never
 * refetched. Otherwise the key is locked, the ASN listing is paged until it
 * runs out, each usable ASN's CIDR block is appended to the artifact, and the
 * entry is recorded. The lock is released on every exit path.
 */
export class ReportBuilder {
  private readonly pageDelayMs: number;
  private readonly replay: ReplayPacing;
  private readonly sleep: SleepFn;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly options: ReportBuilderOptions) {
    this.pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
    this.replay = options.replay ?? DEFAULT_REPLAY;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('report');
  }

  async build(request: BuildRequest): Promise<ReportResult> {
    const { country, sink, onStateChange } = request;
    const date = request.date ?? formatCacheDate(this.clock());
    const { store } = this.options;

    onStateChange?.('CheckingCache');

    try {
      const entry = await store.get(country, date);

      if (entry?.locked) {
        throw new AlreadyBuildingError(country, date);
      }

      if (entry && isCompletedEntry(entry)) {
        if (await store.artifactExists(entry)) {
          onStateChange?.('ReplayingCache');
          const report = await this.replayCached(country, date, entry, sink);
          onStateChange?.('Done');
          return { ok: true, report };
        }
        this.logger.warn(`Artifact for ${country}/${date} is missing; rebuilding`);
      } else if (entry) {
        this.logger.debug(`Entry for ${country}/${date} has no recorded totals; rebuilding`);
      }

      onStateChange?.('Building');
      const report = await this.buildFresh(country, date, sink);
      onStateChange?.('Done');
      return { ok: true, report };
    } catch (error) {
      const reportError = toReportError(error);
      this.logger.debug(`Build for ${country}/${date} failed (${reportError.kind}): ${reportError.message}`);
      onStateChange?.('Failed');
      return { ok: false, error: reportError };
    }
  }

  private async replayCached(
    country: string,
    date: string,
    entry: CompletedCacheEntry,
    sink: ProgressSink | undefined
  ): Promise<ReportArtifact> {
    const totals: ProgressTotals = {
      pagesProcessed: entry.pagesProcessed,
      asnCount: entry.asnCount,
      ipRangeCount: entry.ipRangeCount,
    };
    const plan = planReplay(country, totals, this.replay);

    this.logger.debug(`Replaying ${country}/${date} over ${plan.durationSeconds.toFixed(1)}s`);
    await replayProgress(sink, plan, this.sleep, this.logger);

    return {
      country,
      date,
      artifactPath: entry.filePath,
      totalAsns: entry.asnCount,
      totalIpRanges: entry.ipRangeCount,
      pagesProcessed: entry.pagesProcessed,
      elapsedSeconds: plan.durationSeconds,
      source: 'cache',
    };
  }

  private async buildFresh(country: string, date: string, sink: ProgressSink | undefined): Promise<ReportArtifact> {
    const { store, source } = this.options;

    if (!(await store.tryLock(country, date))) {
      throw new AlreadyBuildingError(country, date);
    }

    const artifactPath = store.artifactPath(country, date);
    const accumulator = new ArtifactAccumulator({
      tempDir: dirname(artifactPath),
      memoryThreshold: this.options.memoryThreshold,
      logger: this.logger,
    });
    const progress = new BuildProgress(country, sink, () => this.clock().getTime(), this.logger);

    try {
      progress.start();
      const totals: ProgressTotals = { pagesProcessed: 0, asnCount: 0, ipRangeCount: 0 };

      for (let page = 1; ; page++) {
        if (page > 1 && this.pageDelayMs > 0) {
          await this.sleep(this.pageDelayMs);
        }

        let listing: AsnPage;
        try {
          listing = await source.listAsns(country, page);
        } catch (error) {
          if (totals.pagesProcessed === 0) {
            throw new InvalidCountryError(country, { cause: error });
          }
          this.logger.warn(`Listing page ${page} for ${country} failed, stopping: ${describeError(error)}`);
          break;
        }

        if (listing.kind === 'end') {
          break;
        }

        totals.pagesProcessed++;
        for (const record of listing.records) {
          if (!isUsableAsn(record)) {
            continue;
          }

          const block = await source.fetchAsnCidrBlock(record.asnId);
          if (!block) {
            continue;
          }

          accumulator.append(block);
          totals.asnCount++;
          totals.ipRangeCount += block.split('\n').length;
        }

        progress.pageCompleted({ ...totals });
      }

      if (!accumulator.hasContent()) {
        throw new InvalidCountryError(country);
      }

      await accumulator.persist(artifactPath);

      const entry: CompletedCacheEntry = {
        cached: true,
        locked: false,
        filePath: artifactPath,
        asnCount: totals.asnCount,
        ipRangeCount: totals.ipRangeCount,
        buildDuration: progress.elapsedSeconds(),
        pagesProcessed: totals.pagesProcessed,
        createdAt: this.clock().toISOString(),
      };

      try {
        await store.put(country, date, entry);
      } catch (error) {
        await this.discardArtifact(artifactPath);
        throw isReportError(error)
          ? error
          : new PersistenceFailureError('record cache entry for', artifactPath, { cause: error });
      }

      this.logger.info(
        `Built ${country}/${date}: ${entry.asnCount} ASNs, ${entry.ipRangeCount} ranges in ${entry.buildDuration}s`
      );

      return {
        country,
        date,
        artifactPath,
        totalAsns: entry.asnCount,
        totalIpRanges: entry.ipRangeCount,
        pagesProcessed: entry.pagesProcessed,
        elapsedSeconds: entry.buildDuration,
        source: 'fresh',
      };
    } finally {
      accumulator.dispose();
      await this.release(country, date);
    }
  }

  /**
   * Removes an artifact that no cache entry points at
   */
  private async discardArtifact(artifactPath: string): Promise<void> {
    try {
      await rm(artifactPath, { force: true });
    } catch (error) {
      this.logger.warn(`Failed to remove orphaned artifact ${artifactPath}: ${describeError(error)}`);
    }
  }

  private async release(country: string, date: string): Promise<void> {
    try {
      await this.options.store.unlock(country, date);
    } catch (error) {
      // The build outcome is already decided; a stuck flag needs the sweep
      this.logger.error(`Failed to unlock ${country}/${date}: ${describeError(error)}`);
    }
  }
}
