import { useCallback, useEffect, useRef, useState } from 'react';
import { readFile } from 'node:fs/promises';
import { useApp, useInput } from 'ink';
import type { OperationType, ProcessingResult, ProcessingStage, WizardScreen } from '../types.js';
import { STAGE_ORDER, getStageIndex } from '../config/processingStages.js';
import { subscribeToConsole } from '../utils/consoleCapture.js';
import { createLogger, describeError, isVerboseEnabled } from '../utils/logger.js';
import { countriesCachedOn, formatCacheDate, getCacheStore } from '../utils/reportCache/index.js';
import type { ProgressUpdate } from '../utils/report/ProgressReporter.js';

const DEFAULT_SPINNER_SYMBOL = '⠋';
const spinnerFrames = [DEFAULT_SPINNER_SYMBOL, '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const MAX_STATUS_MESSAGES = 3;
const logger = createLogger('wizard');

export interface WizardControllerOptions {
  /** Country passed on the command line; starts a report right away */
  initialCountry?: string;
}

export interface WizardControllerState {
  screen: WizardScreen;
  selectedOption: OperationType | null;
  spinnerSymbol: string;
  processingTitle: string;
  statusMessages: string[];
  consoleMessages: string[];
  progress: ProgressUpdate | null;
  currentStage: ProcessingStage | null;
  completedStages: ProcessingStage[];
  elapsedTime: number;
  previewLines: string[] | null;
  result: ProcessingResult | null;
  cachedToday: string[];
  showProcessingConsoleTail: boolean;
  isVerbose: boolean;
  handleMenuSelect: (option: OperationType) => void;
  handleCountrySubmit: (country: string) => Promise<void>;
  resetWizard: () => void;
}

export const useWizardController = (options: WizardControllerOptions = {}): WizardControllerState => {
  const { exit } = useApp();
  const isVerbose = isVerboseEnabled();
  const maxConsoleLines = isVerbose ? 10 : 4;

  const [screen, setScreen] = useState<WizardScreen>('menu');
  const [selectedOption, setSelectedOption] = useState<OperationType | null>(null);
  const [processingTitle, setProcessingTitle] = useState('');
  const [result, setResult] = useState<ProcessingResult | null>(null);
  const [statusMessages, setStatusMessages] = useState<string[]>([]);
  const [consoleMessages, setConsoleMessages] = useState<string[]>([]);
  const [progress, setProgress] = useState<ProgressUpdate | null>(null);
  const [currentStage, setCurrentStage] = useState<ProcessingStage | null>(null);
  const [elapsedTime, setElapsedTime] = useState(0);
  const [spinnerIndex, setSpinnerIndex] = useState(0);
  const [previewLines, setPreviewLines] = useState<string[] | null>(null);
  const [cachedToday, setCachedToday] = useState<string[]>([]);

  const isProcessingRef = useRef(false);
  const startTimeRef = useRef(0);
  // Bumped whenever the user stops watching; callbacks of older runs are ignored
  const runIdRef = useRef(0);

  const spinnerSymbol = spinnerFrames[spinnerIndex % spinnerFrames.length] ?? DEFAULT_SPINNER_SYMBOL;
  const completedStages = currentStage ? STAGE_ORDER.slice(0, getStageIndex(currentStage)) : [];

  useEffect(() => {
    isProcessingRef.current = screen === 'processing';
  }, [screen]);

  useEffect(() => {
    if (screen !== 'processing') {
      setSpinnerIndex(0);
      return undefined;
    }

    const spinner = setInterval(() => {
      setSpinnerIndex(prev => (prev + 1) % spinnerFrames.length);
    }, 80);
    const clock = setInterval(() => {
      setElapsedTime(Date.now() - startTimeRef.current);
    }, 1000);

    return () => {
      clearInterval(spinner);
      clearInterval(clock);
    };
  }, [screen]);

  useEffect(() => {
    if (screen !== 'menu') {
      return undefined;
    }

    let active = true;
    const loadCachedToday = async () => {
      try {
        const store = await getCacheStore();
        const countries = countriesCachedOn(await store.list(), formatCacheDate(new Date()));
        if (active) setCachedToday(countries);
      } catch (error) {
        logger.debug(`Could not list cached reports: ${describeError(error)}`);
      }
    };
    void loadCachedToday();

    return () => {
      active = false;
    };
  }, [screen]);

  useEffect(() => {
    const unsubscribe = subscribeToConsole(
      ({ level, message }) => {
        const prefix = level === 'log' ? 'info' : level;
        const formatted = `[${prefix.toUpperCase()}] ${message}`;
        setConsoleMessages(prev => [...prev.slice(-(maxConsoleLines - 1)), formatted]);
      },
      {
        predicate: entry => {
          if (!isVerbose && isProcessingRef.current && (entry.level === 'log' || entry.level === 'info')) {
            return false;
          }
          return true;
        },
      }
    );

    return unsubscribe;
  }, [isVerbose, maxConsoleLines]);

  const resetWizard = useCallback(() => {
    runIdRef.current++;
    setScreen('menu');
    setSelectedOption(null);
    setResult(null);
    setStatusMessages([]);
    setConsoleMessages([]);
    setProgress(null);
    setCurrentStage(null);
    setElapsedTime(0);
    setPreviewLines(null);
  }, []);

  const runOperation = useCallback(async (operation: OperationType, country?: string) => {
    const runId = ++runIdRef.current;
    const isCurrent = () => runIdRef.current === runId;

    startTimeRef.current = Date.now();
    setSelectedOption(operation);
    setProcessingTitle(operation === 'fetchRanges' ? `Collecting IP ranges for ${country ?? ''}` : 'Sweeping cache');
    setScreen('processing');
    setStatusMessages([]);
    setConsoleMessages([]);
    setProgress(null);
    setCurrentStage(null);
    setElapsedTime(0);
    setResult(null);
    setPreviewLines(null);

    const onStatus = (message: string) => {
      if (isCurrent()) {
        setStatusMessages(prev => [...prev.slice(-(MAX_STATUS_MESSAGES - 1)), message]);
      }
    };

    let processResult: ProcessingResult;
    try {
      if (operation === 'fetchRanges' && country) {
        const { fetchRanges } = await import('../commands/fetchRanges.js');
        processResult = await fetchRanges(country, {
          onStatus,
          onStageChange: stage => {
            if (isCurrent()) setCurrentStage(stage);
          },
          onProgress: update => {
            if (isCurrent()) setProgress(update);
          },
        });
      } else if (operation === 'sweepCache') {
        const { sweepCache } = await import('../commands/sweepCache.js');
        processResult = await sweepCache({ onStatus });
      } else {
        throw new Error('Invalid operation type');
      }
    } catch (error) {
      const errorMessage = describeError(error);
      processResult = {
        success: false,
        message: `Error: ${errorMessage}`,
        error: errorMessage,
      };
    }

    if (!isCurrent()) {
      return;
    }
    setResult(processResult);
    setScreen('complete');
  }, []);

  const handleMenuSelect = useCallback(
    (option: OperationType) => {
      if (option === 'sweepCache') {
        void runOperation('sweepCache');
        return;
      }
      setSelectedOption(option);
      setScreen('countryInput');
    },
    [runOperation]
  );

  const handleCountrySubmit = useCallback(
    (country: string) => runOperation('fetchRanges', country),
    [runOperation]
  );

  const { initialCountry } = options;
  useEffect(() => {
    if (initialCountry) {
      void runOperation('fetchRanges', initialCountry);
    }
  }, [initialCountry, runOperation]);

  useInput(
    (input, key) => {
      if (key.escape || input.toLowerCase() === 'q') {
        // The build keeps running and still records its result in the cache
        resetWizard();
      }
    },
    { isActive: screen === 'processing' }
  );

  useInput(
    (input, key) => {
      const normalizedInput = input.trim().toLowerCase();

      if (key.return || normalizedInput === 'm') {
        resetWizard();
        return;
      }

      const artifactPath = result?.artifactPath;
      if (normalizedInput === 'o' && artifactPath) {
        readFile(artifactPath, 'utf8').then(
          content => {
            const lines = content
              .split(/\r?\n/)
              .map(line => line.trim())
              .filter(line => line.length > 0)
              .slice(0, 3);
            setPreviewLines(lines.length > 0 ? lines : ['(report is empty)']);
          },
          (error: unknown) => {
            setPreviewLines([`(could not read report: ${describeError(error)})`]);
          }
        );
        return;
      }

      if (normalizedInput === 'q') {
        exit();
      }
    },
    { isActive: screen === 'complete' }
  );

  return {
    screen,
    selectedOption,
    spinnerSymbol,
    processingTitle,
    statusMessages,
    consoleMessages,
    progress,
    currentStage,
    completedStages,
    elapsedTime,
    previewLines,
    result,
    cachedToday,
    showProcessingConsoleTail: isVerbose && consoleMessages.length > 0,
    isVerbose,
    handleMenuSelect,
    handleCountrySubmit,
    resetWizard,
  };
};
