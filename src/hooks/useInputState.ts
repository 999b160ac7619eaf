import { useState, useEffect } from 'react';
import { COMMANDS } from '../commands/index';

const NAMES = COMMANDS.map(c => c.name);

export function useInputState() {
  const [input, setInput]           = useState('');
  const [history, setHistory]       = useState<string[]>([]);
  const [historyIdx, setHistoryIdx] = useState(-1);
  const [savedInput, setSavedInput] = useState('');
  const [suggestions, setSuggestions] = useState<string[]>([]);
  const [sugIdx, setSugIdx]           = useState(0);

  useEffect(() => {
    if (input.startsWith('/') && !input.includes(' ')) {
      const q = input.toLowerCase();
      setSuggestions(NAMES.filter(c => c.startsWith(q) && c !== q));
      setSugIdx(0);
    } else {
      setSuggestions([]);
    }
  }, [input]);

  // Пароли, набранные без "/", в историю ввода не попадают
  const pushHistory = (text: string) => {
    if (text.startsWith('/')) {
      setHistory(h => h.length && h[h.length - 1] === text ? h : [...h, text]);
    }
    setHistoryIdx(-1);
    setSavedInput('');
    setSuggestions([]);
    setSugIdx(0);
  };

  return {
    input, setInput,
    history, historyIdx, setHistoryIdx,
    savedInput, setSavedInput,
    suggestions, setSuggestions,
    sugIdx, setSugIdx,
    pushHistory,
  };
}
