import type { ReportErrorKind } from './utils/report/errors.js';
import type { ReportArtifact } from './utils/report/ReportBuilder.js';
import type { SweepResult } from './utils/reportCache/sweep.js';
import type { GateDenialReason } from './utils/requestGate.js';

export type WizardScreen = 'menu' | 'countryInput' | 'processing' | 'complete';

export type OperationType = 'fetchRanges' | 'sweepCache';

export interface MenuOption {
  id: OperationType;
  label: string;
  emoji: string;
}

export type ProcessingStage = 'authorizing' | 'checkingCache' | 'collecting' | 'complete';

export interface StageInfo {
  stage: ProcessingStage;
  label: string;
  description: string;
  icon: string;
}

/**
 * Why a command did not produce a report: a pipeline failure, a gate denial
 * or input that never reached the pipeline
 */
export type FailureKind = ReportErrorKind | 'GateDenied' | 'InvalidInput';

export interface ProcessingResult {
  success: boolean;
  message: string;
  error?: string;
  errorKind?: FailureKind;
  denialReason?: GateDenialReason;
  artifactPath?: string;
  report?: ReportArtifact;
  sweep?: SweepResult;
}
