import React from 'react';
import { Box, Text } from 'ink';
import type { ProcessingStage } from '../types.js';
import type { ProgressUpdate } from '../utils/report/ProgressReporter.js';
import { STAGE_ORDER, getStageInfo, getStageIndex, formatDuration } from '../config/processingStages.js';

interface ProcessingScreenProps {
  spinnerSymbol: string;
  title: string;
  statusMessages: string[];
  progress: ProgressUpdate | null;
  consoleMessages: string[];
  showConsoleTail: boolean;
  currentStage?: ProcessingStage;
  completedStages?: ProcessingStage[];
  elapsedTime?: number;
}

export const ProcessingScreen: React.FC<ProcessingScreenProps> = ({
  spinnerSymbol,
  title,
  statusMessages,
  progress,
  consoleMessages,
  showConsoleTail,
  currentStage,
  completedStages = [],
  elapsedTime,
}) => {
  const currentStageInfo = currentStage ? getStageInfo(currentStage) : null;
  const currentStageIndex = currentStage ? getStageIndex(currentStage) : -1;

  return (
    <Box flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="yellow">
          {spinnerSymbol} {title}
        </Text>
      </Box>

      {currentStage && (
        <Box marginBottom={1}>
          {STAGE_ORDER.map((stage, index) => {
            const stageInfo = getStageInfo(stage);
            const isCompleted = completedStages.includes(stage);
            const isCurrent = stage === currentStage;

            let symbol = '○';
            let color: 'green' | 'yellow' | 'gray' = 'gray';
            if (isCompleted) {
              symbol = stageInfo.icon;
              color = 'green';
            } else if (isCurrent) {
              symbol = stageInfo.icon;
              color = 'yellow';
            } else if (index < currentStageIndex) {
              symbol = stageInfo.icon;
            }

            return (
              <Text key={stage} color={color}>
                {symbol}
                {index < STAGE_ORDER.length - 1 ? ' → ' : ''}
              </Text>
            );
          })}
        </Box>
      )}

      {currentStageInfo && (
        <Box marginBottom={1} paddingX={1}>
          <Text bold color="cyan">
            {currentStageInfo.label}:
          </Text>
          <Text> {currentStageInfo.description}</Text>
        </Box>
      )}

      {progress && (
        <Box flexDirection="column" marginBottom={1} paddingX={1}>
          <Text>Pages processed: {progress.pagesProcessed}</Text>
          <Text>ASNs collected: {progress.asnCount}</Text>
          <Text>IP ranges: {progress.ipRangeCount}</Text>
        </Box>
      )}

      {elapsedTime !== undefined && (
        <Box marginBottom={1} paddingX={1}>
          <Text dimColor>Elapsed: </Text>
          <Text>{formatDuration(elapsedTime)}</Text>
        </Box>
      )}

      <Box flexDirection="column" marginBottom={1}>
        {statusMessages.length === 0 ? (
          <Text dimColor>Please wait...</Text>
        ) : (
          statusMessages.map((message, index) => (
            <Text key={`${message}-${index}`} dimColor>
              {message}
            </Text>
          ))
        )}
      </Box>

      {showConsoleTail && (
        <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1} paddingY={0}>
          <Text dimColor>Console tail:</Text>
          {consoleMessages.map((line, index) => (
            <Text key={`processing-console-${index}`} dimColor>
              {line}
            </Text>
          ))}
        </Box>
      )}

      <Box marginTop={1}>
        <Text dimColor>Press Q or Esc to stop watching</Text>
      </Box>
    </Box>
  );
};
