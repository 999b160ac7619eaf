import React from 'react';
import { Box, Text, useStdout } from 'ink';
import { version as VERSION } from '../../package.json';

interface Props {
  historyCount: number;
  historyLimit: number;
  length: number;
}

export function Header({ historyCount, historyLimit, length }: Props) {
  const { stdout } = useStdout();
  const width = stdout?.columns ?? 80;
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box borderStyle="round" borderColor="cyan" paddingX={1} width={width}>
        <Text color="cyan" bold>{'◆  '}</Text>
        <Text bold>PassKit  </Text>
        <Text color="gray" dimColor>{'v' + VERSION + '  ·  '}</Text>
        <Text color="green">{`length ${length}`}</Text>
        <Text color="gray" dimColor>{'  ·  '}</Text>
        <Text color="green">{`history ${historyCount}/${historyLimit}`}</Text>
      </Box>
    </Box>
  );
}
