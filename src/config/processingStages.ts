import type { ProcessingStage, StageInfo } from '../types.js';
import type { BuildState } from '../utils/report/ReportBuilder.js';

/**
 * Display metadata for each stage of a report request.
 * Cache replays and fresh builds both show as 'collecting'.
 */
export const STAGE_DEFINITIONS: Record<ProcessingStage, StageInfo> = {
  authorizing: {
    stage: 'authorizing',
    label: 'Authorizing',
    description: 'Checking request quota',
    icon: '🔑',
  },
  checkingCache: {
    stage: 'checkingCache',
    label: 'Preparing',
    description: 'Looking up today\'s report',
    icon: '🗂️',
  },
  collecting: {
    stage: 'collecting',
    label: 'Collecting',
    description: 'Gathering IP ranges per ASN',
    icon: '🌐',
  },
  complete: {
    stage: 'complete',
    label: 'Complete',
    description: 'Report ready',
    icon: '✓',
  },
};

export const STAGE_ORDER: ProcessingStage[] = ['authorizing', 'checkingCache', 'collecting', 'complete'];

export function getStageInfo(stage: ProcessingStage): StageInfo {
  return STAGE_DEFINITIONS[stage];
}

export function getStageIndex(stage: ProcessingStage): number {
  return STAGE_ORDER.indexOf(stage);
}

/**
 * Stage shown for a builder state; null when the display should not move
 */
export function stageForBuildState(state: BuildState): ProcessingStage | null {
  switch (state) {
    case 'CheckingCache':
      return 'checkingCache';
    case 'ReplayingCache':
    case 'Building':
      return 'collecting';
    case 'Done':
      return 'complete';
    case 'Idle':
    case 'Failed':
      return null;
  }
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  const seconds = Math.ceil(ms / 1000);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (remainingSeconds === 0) {
    return `${minutes}m`;
  }

  return `${minutes}m ${remainingSeconds}s`;
}
