import React from 'react';
import { Box, Text } from 'ink';
import { getRiskLevel, riskColor } from '../features/patterns';
import { strengthBar } from '../features/report';
import { checkStrength } from '../features/strength';

interface Props {
  password: string;
}

// Пересчитывается на каждое нажатие клавиши
export function StrengthMeter({ password }: Props) {
  const result = checkStrength(password);
  const risk = getRiskLevel(password);
  return (
    <Box paddingLeft={2}>
      <Text color={result.color}>{`[${strengthBar(result.score)}] ${result.level}`}</Text>
      <Text color="gray">{'  ·  '}</Text>
      <Text color={riskColor(risk)}>{`risk ${risk}`}</Text>
      {result.tips.length > 0 && (
        <Text color="gray" dimColor>{'  ·  ' + result.tips.join(', ')}</Text>
      )}
    </Box>
  );
}
