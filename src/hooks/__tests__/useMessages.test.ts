import { describe, it, expect } from 'vitest';
import { messagesReducer } from '../useMessages';

describe('messagesReducer', () => {
  it('appends messages with increasing ids', () => {
    const one = messagesReducer([], { type: 'add', role: 'user', content: '/gen' });
    const two = messagesReducer(one, { type: 'add', role: 'system', content: 'done' });

    expect(two.map(m => [m.role, m.content])).toEqual([['user', '/gen'], ['system', 'done']]);
    expect(two[1].id).toBeGreaterThan(two[0].id);
    expect(one).toHaveLength(1);
  });

  it('clears everything', () => {
    const state = messagesReducer([], { type: 'add', role: 'error', content: 'oops' });
    expect(messagesReducer(state, { type: 'clear' })).toEqual([]);
  });
});
