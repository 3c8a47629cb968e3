import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import type { MenuOption, OperationType } from '../types.js';

interface MenuProps {
  onSelect: (option: OperationType) => void;
  /** Countries whose report for today is already built */
  cachedToday?: string[];
}

export const menuOptions: MenuOption[] = [
  {
    id: 'fetchRanges',
    label: 'Get IP ranges for a country',
    emoji: '🌐',
  },
  {
    id: 'sweepCache',
    label: 'Remove reports from previous days',
    emoji: '🧹',
  },
];

export const Menu: React.FC<MenuProps> = ({ onSelect, cachedToday = [] }) => {
  const [selectedIndex, setSelectedIndex] = useState(0);

  useInput((_input, key) => {
    if (key.upArrow) {
      setSelectedIndex(prev => (prev > 0 ? prev - 1 : menuOptions.length - 1));
    }

    if (key.downArrow) {
      setSelectedIndex(prev => (prev < menuOptions.length - 1 ? prev + 1 : 0));
    }

    if (key.return) {
      const option = menuOptions[selectedIndex];
      if (option) {
        onSelect(option.id);
      }
    }
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">
          🌐 Country IP Ranges
        </Text>
      </Box>

      <Box marginBottom={1}>
        <Text>Select an option:</Text>
      </Box>

      {menuOptions.map((option, index) => {
        const isSelected = index === selectedIndex;
        return (
          <Box key={option.id} marginLeft={1}>
            <Text color={isSelected ? 'cyan' : 'gray'}>
              {isSelected ? '❯ ' : '  '}
              {option.emoji} {option.label}
            </Text>
          </Box>
        );
      })}

      {cachedToday.length > 0 && (
        <Box marginTop={1} marginLeft={1}>
          <Text color="green">📦 Ready without fetching: {cachedToday.join(', ')}</Text>
        </Box>
      )}

      <Box marginTop={1}>
        <Text dimColor>↑↓ Navigate • Enter to select • Ctrl+C to exit</Text>
      </Box>
    </Box>
  );
};
