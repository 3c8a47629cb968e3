import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import { normalizeCountryCode } from '../utils/countryCode.js';

interface CountryInputProps {
  onSubmit: (country: string) => void;
  onCancel?: () => void;
}

export const CountryInput: React.FC<CountryInputProps> = ({ onSubmit, onCancel }) => {
  const [value, setValue] = useState('');
  const [error, setError] = useState<string | null>(null);

  useInput((_input, key) => {
    if (key.escape && onCancel) {
      onCancel();
    }
  });

  const handleChange = (next: string) => {
    setValue(next);
    setError(null);
  };

  const handleSubmit = () => {
    if (!value.trim()) {
      return;
    }

    const country = normalizeCountryCode(value);
    if (!country) {
      setError(`"${value.trim()}" is not a 2-letter country code`);
      return;
    }
    onSubmit(country);
  };

  return (
    <Box flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">
          🌐 Get IP Ranges
        </Text>
      </Box>

      <Box marginBottom={1}>
        <Text>Enter a 2-letter country code:</Text>
      </Box>

      <Box marginBottom={1}>
        <Text color="cyan">&gt; </Text>
        <TextInput value={value} onChange={handleChange} onSubmit={handleSubmit} placeholder="DE" />
      </Box>

      {error && (
        <Box marginBottom={1}>
          <Text color="red">{error}</Text>
        </Box>
      )}

      <Box>
        <Text dimColor>Enter to continue • Esc to go back • Ctrl+C to exit</Text>
      </Box>
    </Box>
  );
};
