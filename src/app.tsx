import React, { useState, useCallback } from 'react';
import { render, Box, useInput, useApp } from 'ink';
import { Header }        from './components/Header';
import { WelcomeTips }   from './components/WelcomeTips';
import { InputBox }      from './components/InputBox';
import { HistoryScreen } from './components/HistoryScreen';
import { UserMessage, SystemMessage, ErrorMessage } from './components/Messages';
import { useMessages }   from './hooks/useMessages';
import { useInputState } from './hooks/useInputState';
import { checkPassword, parseInput, useCommands } from './commands/index';
import { isCliCommand, runCli } from './cli';
import { bootstrapServices } from './services';
import type { AppServices } from './services';
import type { Screen } from './types';

// ─── App ─────────────────────────────────────────────────────────────────────
function App({ services }: { services: AppServices }) {
  const { exit } = useApp();
  const { messages, add, clear } = useMessages();
  const [screen, setScreen] = useState<Screen>('chat');
  const [masked, setMasked] = useState(true);

  const {
    input, setInput,
    history, historyIdx, setHistoryIdx,
    savedInput, setSavedInput,
    suggestions, setSuggestions,
    sugIdx, setSugIdx,
    pushHistory,
  } = useInputState();

  const handleCommand = useCommands(services, add, clear, exit, setScreen, masked);

  const handleSubmit = useCallback((text: string) => {
    const input = parseInput(text);
    if (input.kind === 'empty') return;

    pushHistory(text.trim());

    if (input.kind === 'command') {
      handleCommand(input.cmd, input.arg);
      return;
    }

    // Обычный ввод — это пароль для проверки
    add('user', masked ? '*'.repeat(input.password.length) : input.password);
    checkPassword({ services, add, clear, exit, openScreen: setScreen, masked }, input.password);
  }, [services, masked, add, clear, exit, handleCommand, pushHistory]);

  useInput((char, key) => {
    if (key.ctrl && char === 'c') { exit(); return; }

    // Экран истории обрабатывает ввод сам
    if (screen !== 'chat') return;

    if (key.ctrl && char === 't') { setMasked(m => !m); return; }

    const hasSugs = suggestions.length > 0;

    if (key.upArrow) {
      if (hasSugs) {
        setSugIdx(i => Math.max(0, i - 1));
      } else if (history.length > 0) {
        if (historyIdx === -1) {
          setSavedInput(input);
          const idx = history.length - 1;
          setHistoryIdx(idx);
          setInput(history[idx]);
        } else if (historyIdx > 0) {
          const idx = historyIdx - 1;
          setHistoryIdx(idx);
          setInput(history[idx]);
        }
      }
      return;
    }

    if (key.downArrow) {
      if (hasSugs) {
        setSugIdx(i => Math.min(suggestions.length - 1, i + 1));
      } else if (historyIdx !== -1) {
        if (historyIdx < history.length - 1) {
          const idx = historyIdx + 1;
          setHistoryIdx(idx);
          setInput(history[idx]);
        } else {
          setHistoryIdx(-1);
          setInput(savedInput);
        }
      }
      return;
    }

    if (key.tab) {
      if (hasSugs) setInput(suggestions[sugIdx]);
      return;
    }

    if (key.escape) {
      if (hasSugs) {
        setSuggestions([]);
      } else if (historyIdx !== -1) {
        setHistoryIdx(-1);
        setInput(savedInput);
      }
      return;
    }

    if (key.return) {
      const text = hasSugs ? suggestions[sugIdx] : input;
      handleSubmit(text);
      setInput('');
      return;
    }

    if (key.backspace || key.delete) {
      setInput(s => s.slice(0, -1));
      if (historyIdx !== -1) setHistoryIdx(-1);
      return;
    }

    if (!key.ctrl && !key.meta && !key.escape && char) {
      setInput(s => s + char);
      if (historyIdx !== -1) setHistoryIdx(-1);
    }
  });

  // ── Экран истории ──────────────────────────────────────────────────────────
  if (screen === 'history') {
    return <HistoryScreen history={services.history} onExit={() => setScreen('chat')} />;
  }

  // ── Основной интерфейс ─────────────────────────────────────────────────────
  return (
    <Box flexDirection="column">
      <Header
        historyCount={services.history.count()}
        historyLimit={services.config.historyLimit}
        length={services.generator.getLength()}
      />
      {messages.length === 0 && <WelcomeTips />}
      {messages.map(msg => {
        if (msg.role === 'user')  return <UserMessage  key={msg.id} content={msg.content} />;
        if (msg.role === 'error') return <ErrorMessage key={msg.id} content={msg.content} />;
        return                           <SystemMessage key={msg.id} content={msg.content} />;
      })}
      <InputBox
        value={input}
        masked={masked}
        suggestions={suggestions}
        sugIdx={sugIdx}
      />
    </Box>
  );
}

// ─── CLI entry ────────────────────────────────────────────────────────────────
const services = bootstrapServices();
const [sub, ...rest] = process.argv.slice(2);

if (isCliCommand(sub)) {
  process.exitCode = runCli(
    [sub, ...rest],
    services,
    text => process.stdout.write(text + '\n'),
    text => process.stderr.write(text + '\n'),
  );
} else {
  render(<App services={services} />);
}
