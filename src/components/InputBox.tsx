import React from 'react';
import { Box, Text, useStdout } from 'ink';
import { StrengthMeter } from './StrengthMeter';
import { Suggestions } from './Suggestions';

interface Props {
  value: string;
  masked: boolean;
  suggestions: string[];
  sugIdx: number;
}

export function InputBox({ value, masked, suggestions, sugIdx }: Props) {
  const { stdout } = useStdout();
  const width = stdout?.columns ?? 80;
  const hasSugs = suggestions.length > 0;
  const isPassword = value.length > 0 && !value.startsWith('/');
  const shown = isPassword && masked ? '*'.repeat(value.length) : value;

  return (
    <Box flexDirection="column" marginTop={1}>
      <Box
        borderStyle="round"
        borderColor="cyan"
        paddingX={1}
        width={width}
        minHeight={3}
      >
        <Box flexGrow={1}>
          <Text color="cyan" bold>{'> '}</Text>
          <Text color="white">{shown}</Text>
          <Text backgroundColor="cyan" color="black">{' '}</Text>
        </Box>
      </Box>

      {hasSugs && <Suggestions items={suggestions} selectedIdx={sugIdx} typed={value} />}
      {isPassword && <StrengthMeter password={value} />}

      <Box paddingLeft={2}>
        <Text color="gray" dimColor>
          {hasSugs
            ? 'Tab/Enter select  ·  ↑↓ navigate  ·  Esc close'
            : 'Enter submit  ·  ↑↓ history  ·  Ctrl+T ' + (masked ? 'show' : 'hide') + '  ·  Ctrl+C quit  ·  /help'}
        </Text>
      </Box>
    </Box>
  );
}
