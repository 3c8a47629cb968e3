import { stageForBuildState } from '../config/processingStages.js';
import type { ProcessingResult, ProcessingStage } from '../types.js';
import { normalizeCountryCode } from '../utils/countryCode.js';
import { createLogger } from '../utils/logger.js';
import { toReportError, type ReportErrorKind } from '../utils/report/errors.js';
import { createReportBuilder } from '../utils/report/index.js';
import type { ProgressUpdate } from '../utils/report/ProgressReporter.js';
import type { ReportArtifact, ReportBuilder } from '../utils/report/ReportBuilder.js';
import { allowAllGate, type GateDenialReason, type RequestGate } from '../utils/requestGate.js';

const logger = createLogger('fetch-ranges');

export interface FetchRangesOptions {
  /** Defaults to a builder wired from the loaded config */
  builder?: ReportBuilder;
  gate?: RequestGate;
  /** Identity the gate meters; the terminal front end has a single user */
  userId?: string;
  onStatus?: (status: string) => void;
  onStageChange?: (stage: ProcessingStage) => void;
  onProgress?: (update: ProgressUpdate) => void;
}

const FAILURE_MESSAGES: Record<ReportErrorKind, (country: string) => string> = {
  InvalidCountry: (country) => `No IP ranges found for ${country}. Check the country code and try again.`,
  AlreadyBuilding: (country) => `A report for ${country} is already being prepared. Try again in a moment.`,
  RateLimited: () => 'The ASN listing is rate limiting requests right now. Try again later.',
  UpstreamUnavailable: () => 'The ASN listing is unavailable right now. Try again later.',
  NotFound: (country) => `No published IP ranges for ${country}.`,
  PersistenceFailure: () => 'The report could not be saved. Check that the data directory is writable.',
  Unexpected: () => 'Something went wrong while building the report.',
};

const DENIAL_MESSAGES: Record<GateDenialReason, string> = {
  daily_limit: 'You have used all of today\'s free requests. Try again tomorrow.',
  no_coins: 'Not enough coins for another request today.',
  busy: 'Your previous request is still running. Wait for it to finish.',
};

export function describeFailure(kind: ReportErrorKind, country: string): string {
  return FAILURE_MESSAGES[kind](country);
}

export function describeReport(report: ReportArtifact): string {
  return `IP ranges for ${report.country}: ${report.totalIpRanges} ranges from ${report.totalAsns} ASNs (${report.pagesProcessed} pages)`;
}

/**
 * Validates the country code, asks the gate, runs the builder and turns the
 * outcome into a ProcessingResult with user-facing text.
 */
export async function fetchRanges(input: string, options: FetchRangesOptions = {}): Promise<ProcessingResult> {
  const country = normalizeCountryCode(input);
  if (!country) {
    return {
      success: false,
      message: `"${input.trim()}" is not a 2-letter country code.`,
      errorKind: 'InvalidInput',
    };
  }

  const emitStatus = options.onStatus ?? ((status: string) => logger.info(status));
  const gate = options.gate ?? allowAllGate;
  const userId = options.userId ?? 'local';

  options.onStageChange?.('authorizing');
  const decision = await gate.authorize(userId);
  if (!decision.allowed) {
    return {
      success: false,
      message: DENIAL_MESSAGES[decision.reason],
      errorKind: 'GateDenied',
      denialReason: decision.reason,
    };
  }

  try {
    const builder = options.builder ?? (await createReportBuilder());
    emitStatus(`Collecting IP ranges for ${country}...`);

    const result = await builder.build({
      country,
      sink: options.onProgress ? { emit: options.onProgress } : undefined,
      onStateChange: (state) => {
        const stage = stageForBuildState(state);
        if (stage) {
          options.onStageChange?.(stage);
        }
      },
    });

    if (!result.ok) {
      emitStatus(`✗ ${result.error.message}`);
      return {
        success: false,
        message: describeFailure(result.error.kind, country),
        error: result.error.message,
        errorKind: result.error.kind,
      };
    }

    emitStatus(`✓ Report ready for ${country}`);
    return {
      success: true,
      message: describeReport(result.report),
      artifactPath: result.report.artifactPath,
      report: result.report,
    };
  } catch (error) {
    const reportError = toReportError(error);
    emitStatus(`✗ ${reportError.message}`);
    return {
      success: false,
      message: describeFailure(reportError.kind, country),
      error: reportError.message,
      errorKind: reportError.kind,
    };
  } finally {
    gate.release(userId);
  }
}
