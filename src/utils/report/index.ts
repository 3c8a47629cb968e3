import { getConfig } from '../../config/index.js';
import { createAsnSourceFromConfig } from '../asnSource/index.js';
import type { AsnSource } from '../asnSource/types.js';
import { getCacheStore } from '../reportCache/index.js';
import type { CacheStore } from '../reportCache/types.js';
import { ReportBuilder } from './ReportBuilder.js';

export interface ReportBuilderOverrides {
  store?: CacheStore;
  source?: AsnSource;
}

/**
 * Wires a builder from the loaded configuration. Collaborators that are not
 * overridden come from the file-backed store and the HTTP source.
 */
export async function createReportBuilder(overrides: ReportBuilderOverrides = {}): Promise<ReportBuilder> {
  const config = getConfig();

  return new ReportBuilder({
    store: overrides.store ?? (await getCacheStore()),
    source: overrides.source ?? createAsnSourceFromConfig(),
    pageDelayMs: config.sources.pageDelayMs,
    replay: {
      minSeconds: config.replay.minSeconds,
      maxSeconds: config.replay.maxSeconds,
    },
  });
}

export { ReportBuilder } from './ReportBuilder.js';
export type { BuildRequest, BuildState, ReportArtifact, ReportBuilderOptions, ReportResult } from './ReportBuilder.js';
export { BuildProgress, emitSafely, planReplay, replayProgress } from './ProgressReporter.js';
export type { ProgressSink, ProgressTotals, ProgressUpdate, ReplayPacing, ReplayPlan } from './ProgressReporter.js';
export {
  AlreadyBuildingError,
  InvalidCountryError,
  NotFoundError,
  PersistenceFailureError,
  RateLimitedError,
  ReportError,
  UpstreamUnavailableError,
  isReportError,
  toReportError,
} from './errors.js';
export type { ReportErrorKind } from './errors.js';
