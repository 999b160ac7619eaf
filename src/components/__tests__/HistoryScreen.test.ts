import { describe, it, expect } from 'vitest';
import { historyKeyAction } from '../HistoryScreen';

describe('historyKeyAction', () => {
  it('leaves on q, Q or Esc', () => {
    expect(historyKeyAction('q', false)).toBe('back');
    expect(historyKeyAction('Q', false)).toBe('back');
    expect(historyKeyAction('', true)).toBe('back');
  });

  it('takes delete and clear in either case', () => {
    expect(historyKeyAction('d', false)).toBe('delete');
    expect(historyKeyAction('D', false)).toBe('delete');
    expect(historyKeyAction('c', false)).toBe('clear');
    expect(historyKeyAction('C', false)).toBe('clear');
  });

  it('ignores other keys', () => {
    expect(historyKeyAction('x', false)).toBeNull();
  });
});
