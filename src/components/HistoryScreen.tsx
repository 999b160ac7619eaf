import React, { useState } from 'react';
import { Box, Text, useInput, useStdout } from 'ink';
import type { HistoryEntry, PasswordHistory } from '../features/history';
import { shortTimestamp } from '../features/report';
import { colorForLevel } from '../features/strength';
import type { TextColor } from '../types';

interface Props {
  history: PasswordHistory;
  onExit: () => void;
}

export type HistoryKeyAction = 'back' | 'delete' | 'clear' | null;

export function historyKeyAction(char: string, escape: boolean): HistoryKeyAction {
  if (escape || char === 'q' || char === 'Q') return 'back';
  if (char === 'd' || char === 'D') return 'delete';
  if (char === 'c' || char === 'C') return 'clear';
  return null;
}

const newestFirst = (history: PasswordHistory) => history.getAllWithMetadata().reverse();

function strengthColor(entry: HistoryEntry): TextColor {
  return entry.strength === 'unknown' ? 'gray' : colorForLevel(entry.strength);
}

export function HistoryScreen({ history, onExit }: Props) {
  const { stdout } = useStdout();
  const width = stdout?.columns ?? 80;

  const [entries, setEntries] = useState<HistoryEntry[]>(() => newestFirst(history));
  const [selected, setSelected] = useState(0);
  const [notice, setNotice] = useState<string | null>(null);

  useInput((char, key) => {
    if (key.upArrow)   setSelected(i => Math.max(0, i - 1));
    if (key.downArrow) setSelected(i => Math.min(entries.length - 1, i + 1));

    const action = historyKeyAction(char, key.escape);

    if (action === 'back') { onExit(); return; }

    if (action === 'delete') {
      const item = entries[selected];
      if (!item) return;
      history.removePassword(item.password);
      const next = newestFirst(history);
      setEntries(next);
      setSelected(i => Math.max(0, Math.min(i, next.length - 1)));
      setNotice('Removed ' + item.password);
      return;
    }

    if (action === 'clear') {
      history.clearHistory();
      setEntries([]);
      setSelected(0);
      setNotice('History cleared');
    }
  });

  return (
    <Box flexDirection="column" width={width}>
      {/* Заголовок */}
      <Box borderStyle="round" borderColor="cyan" paddingX={1} marginBottom={1} width={width}>
        <Text color="cyan" bold>◆  </Text>
        <Text bold>Password history  </Text>
        <Text color="gray">{`${entries.length} of ${history.getLimit()}`}</Text>
      </Box>

      {entries.length === 0 && (
        <Box paddingLeft={2} marginBottom={1}>
          <Text color="gray">No passwords in history yet.</Text>
        </Box>
      )}

      {entries.map((entry, i) => {
        const isSelected = i === selected;
        return (
          <Box key={entry.password} paddingLeft={3}>
            <Text color={isSelected ? 'white' : 'gray'}>{isSelected ? '❯ ' : '  '}</Text>
            <Text color={isSelected ? 'white' : 'gray'} bold={isSelected}>
              {entry.password}
            </Text>
            <Text color={strengthColor(entry)}>{`  ${entry.strength}`}</Text>
            <Text color="gray" dimColor>{`  ${shortTimestamp(entry.timestamp)}`}</Text>
          </Box>
        );
      })}

      {notice && (
        <Box paddingLeft={2} marginTop={1}>
          <Text color="green">{`✓ ${notice}`}</Text>
        </Box>
      )}

      {/* Подвал */}
      <Box paddingLeft={2} marginTop={1}>
        <Text color="gray" dimColor>
          {'↑↓ navigate' + (entries.length > 0 ? '  ·  D delete  ·  C clear all' : '') + '  ·  Q/Esc back'}
        </Text>
      </Box>
    </Box>
  );
}
