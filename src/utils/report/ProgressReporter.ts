import type { SleepFn } from '../asnSource/retry.js';
import { describeError, type Logger } from '../logger.js';

/**
 * Running totals shown to the user while a report is produced
 */
export interface ProgressUpdate {
  country: string;
  pagesProcessed: number;
  asnCount: number;
  ipRangeCount: number;
  elapsedSeconds: number;
}

export type ProgressTotals = Pick<ProgressUpdate, 'pagesProcessed' | 'asnCount' | 'ipRangeCount'>;

/**
 * Caller-supplied receiver for progress updates. Emission is fire-and-forget:
 * a sink that throws or rejects never affects the build.
 */
export interface ProgressSink {
  emit(update: ProgressUpdate): void | Promise<void>;
}

export function emitSafely(sink: ProgressSink | undefined, update: ProgressUpdate, logger: Logger): void {
  if (!sink) {
    return;
  }

  const onFailure = (error: unknown) => {
    logger.debug(`Progress sink rejected an update for ${update.country}: ${describeError(error)}`);
  };

  try {
    const pending = sink.emit(update);
    if (pending instanceof Promise) {
      pending.catch(onFailure);
    }
  } catch (error) {
    onFailure(error);
  }
}

/**
 * Progress of a build that is actually fetching data: an all-zero update when
 * it starts, then one update per completed listing page.
 */
export class BuildProgress {
  private readonly startedAt: number;

  constructor(
    private readonly country: string,
    private readonly sink: ProgressSink | undefined,
    private readonly now: () => number,
    private readonly logger: Logger
  ) {
    this.startedAt = now();
  }

  /** Seconds since the build started, to two decimals */
  elapsedSeconds(): number {
    return Math.round((this.now() - this.startedAt) / 10) / 100;
  }

  start(): ProgressUpdate {
    return this.emit({ pagesProcessed: 0, asnCount: 0, ipRangeCount: 0 });
  }

  pageCompleted(totals: ProgressTotals): ProgressUpdate {
    return this.emit(totals);
  }

  private emit(totals: ProgressTotals): ProgressUpdate {
    const update: ProgressUpdate = {
      country: this.country,
      ...totals,
      elapsedSeconds: this.elapsedSeconds(),
    };
    emitSafely(this.sink, update, this.logger);
    return update;
  }
}

export interface ReplayPacing {
  minSeconds: number;
  maxSeconds: number;
  /** Uniform source in [0, 1); defaults to Math.random */
  random?: () => number;
}

export interface ReplayPlan {
  durationSeconds: number;
  stepSeconds: number;
  /** Initial zero update followed by one update per step */
  updates: ProgressUpdate[];
}

/**
 * Lays out the synthetic progress shown for a cached report.
 *
 * The duration is drawn uniformly from [minSeconds, maxSeconds] and split into
 * `max(1, floor(duration))` evenly spaced steps. Intermediate values are
 * floored; the last step carries the stored totals and the full duration.
 */
export function planReplay(country: string, totals: ProgressTotals, pacing: ReplayPacing): ReplayPlan {
  const random = pacing.random ?? Math.random;
  const durationSeconds = pacing.minSeconds + random() * (pacing.maxSeconds - pacing.minSeconds);
  const steps = Math.max(1, Math.floor(durationSeconds));
  const stepSeconds = durationSeconds / steps;

  const updates: ProgressUpdate[] = [
    { country, pagesProcessed: 0, asnCount: 0, ipRangeCount: 0, elapsedSeconds: 0 },
  ];

  for (let step = 1; step <= steps; step++) {
    if (step === steps) {
      updates.push({ country, ...totals, elapsedSeconds: durationSeconds });
      break;
    }

    updates.push({
      country,
      pagesProcessed: Math.floor((totals.pagesProcessed * step) / steps),
      asnCount: Math.floor((totals.asnCount * step) / steps),
      ipRangeCount: Math.floor((totals.ipRangeCount * step) / steps),
      elapsedSeconds: stepSeconds * step,
    });
  }

  return { durationSeconds, stepSeconds, updates };
}

/**
 * Emits a replay plan, waiting `stepSeconds` between updates
 */
export async function replayProgress(
  sink: ProgressSink | undefined,
  plan: ReplayPlan,
  sleep: SleepFn,
  logger: Logger
): Promise<void> {
  const [first, ...rest] = plan.updates;
  if (first) {
    emitSafely(sink, first, logger);
  }

  for (const update of rest) {
    await sleep(plan.stepSeconds * 1000);
    emitSafely(sink, update, logger);
  }
}
