import React from 'react';
import { Box } from 'ink';
import { Menu } from './components/Menu.js';
import { CountryInput } from './components/CountryInput.js';
import { ProcessingScreen } from './components/ProcessingScreen.js';
import { CompleteScreen } from './components/CompleteScreen.js';
import { useWizardController } from './hooks/useWizardController.js';

interface WizardProps {
  initialCountry?: string;
}

export const Wizard: React.FC<WizardProps> = ({ initialCountry }) => {
  const {
    screen,
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
    showProcessingConsoleTail,
    isVerbose,
    handleMenuSelect,
    handleCountrySubmit,
    resetWizard,
  } = useWizardController(initialCountry ? { initialCountry } : {});

  if (screen === 'menu') {
    return (
      <Box borderStyle="round" borderColor="cyan" flexDirection="column">
        <Menu onSelect={handleMenuSelect} cachedToday={cachedToday} />
      </Box>
    );
  }

  if (screen === 'countryInput') {
    return (
      <Box borderStyle="round" borderColor="cyan" flexDirection="column">
        <CountryInput
          onSubmit={country => {
            void handleCountrySubmit(country);
          }}
          onCancel={resetWizard}
        />
      </Box>
    );
  }

  if (screen === 'processing') {
    return (
      <ProcessingScreen
        spinnerSymbol={spinnerSymbol}
        title={processingTitle}
        statusMessages={statusMessages}
        progress={progress}
        consoleMessages={consoleMessages}
        showConsoleTail={showProcessingConsoleTail}
        {...(currentStage ? { currentStage } : {})}
        completedStages={completedStages}
        elapsedTime={elapsedTime}
      />
    );
  }

  if (screen === 'complete' && result) {
    return (
      <CompleteScreen
        result={result}
        previewLines={previewLines}
        consoleMessages={consoleMessages}
        isVerbose={isVerbose}
      />
    );
  }

  return null;
};
