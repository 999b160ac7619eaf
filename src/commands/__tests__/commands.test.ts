import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'fs';
import {
  COMMANDS, checkPassword, parseInput, parseLength, parseReqArgs, runCommand, splitArgs,
} from '../index';
import type { CommandContext } from '../index';
import type { AppServices } from '../../services';
import type { MessageRole, Screen } from '../../types';
import { makeTestServices } from '../../__tests__/helpers';

interface Sent { role: MessageRole; content: string }

describe('runCommand', () => {
  let services: AppServices;
  let dir: string;
  let sent: Sent[];
  let screens: Screen[];
  let exits: number;
  let clears: number;

  const ctx = (masked = false): CommandContext => ({
    services,
    add: (role, content) => sent.push({ role, content }),
    clear: () => { clears++; },
    exit: () => { exits++; },
    openScreen: s => screens.push(s),
    masked,
  });
  const run = (cmd: string, arg = '', masked = false) => runCommand(ctx(masked), cmd, arg);
  const last = () => sent[sent.length - 1];

  beforeEach(() => {
    ({ services, dir } = makeTestServices());
    sent = [];
    screens = [];
    exits = 0;
    clears = 0;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('/pattern', () => {
    it('rejects an invalid pattern before generating', () => {
      run('/pattern', 'LX');
      expect(sent).toEqual([{ role: 'error', content: 'Invalid pattern: use only L, U, N, S' }]);
    });

    it('rejects an empty pattern', () => {
      run('/pattern');
      expect(last().role).toBe('error');
    });

    it('reports on the generated password', () => {
      run('/pattern', 'LUNS');
      expect(last()).toEqual({
        role: 'system',
        content: [
          'Password:  A0@a',
          'Strength:  [████░]  4/5 · medium (80%)',
          'Tips:',
          '  • Minimum 8 characters',
          '',
          'Pattern risk: NONE (0/100)',
        ].join('\n'),
      });
      expect(services.history.isEmpty()).toBe(true);
    });
  });

  describe('saving to history', () => {
    it('saves a strong generated password once', () => {
      run('/req', '--length 8');
      expect(last().content.startsWith('Password:  A0@aaaaa\n')).toBe(true);
      expect(last().content.endsWith('\n\nSaved to history.')).toBe(true);
      expect(services.history.getAllWithMetadata().map(e => [e.password, e.strength]))
        .toEqual([['A0@aaaaa', 'strong']]);

      run('/req', '--length 8');
      expect(last().content.endsWith('Saved to history.')).toBe(false);
      expect(services.history.count()).toBe(1);
    });

    it('does not save a weak one', () => {
      run('/gen');
      expect(last().content.startsWith('Password:  aaaaaaaaaaaaaa\n')).toBe(true);
      expect(services.history.isEmpty()).toBe(true);
    });

    it('never saves a checked password', () => {
      run('/check', 'Ab1!Ab1!');
      expect(services.history.isEmpty()).toBe(true);
    });
  });

  describe('/gen and /memorable', () => {
    it('takes an explicit length', () => {
      run('/gen', '5');
      expect(last().content.split('\n')[0]).toBe('Password:  aaaaa');
      run('/memorable', '6');
      expect(last().content.split('\n')[0]).toBe('Password:  @a0ba0');
    });

    it('rejects unusable lengths', () => {
      for (const arg of ['0', 'abc', '513', '-2']) {
        run('/gen', arg);
        expect(last()).toEqual({ role: 'error', content: 'Length must be an integer between 1 and 512' });
      }
    });
  });

  describe('/req', () => {
    it('reports when every class is disabled', () => {
      run('/req', '--no-lower --no-upper --no-digits --no-symbols');
      expect(last()).toEqual({
        role: 'error',
        content: 'Nothing generated: enable at least one character class.',
      });
    });
  });

  describe('/length', () => {
    it('shows and sets the default length', () => {
      run('/length');
      expect(last().content).toBe('Default length: 14');

      run('/length', '0');
      expect(last().role).toBe('error');
      expect(services.generator.getLength()).toBe(14);

      run('/length', '20');
      expect(last().content).toBe('Default length set to 20');
      run('/gen');
      expect(last().content.split('\n')[0]).toBe('Password:  ' + 'a'.repeat(20));
    });
  });

  describe('/check, /details, /compare', () => {
    it('requires an argument', () => {
      run('/check');
      expect(last()).toEqual({ role: 'error', content: 'Usage: /check <password>' });
      run('/details');
      expect(last()).toEqual({ role: 'error', content: 'Usage: /details <password>' });
      run('/compare', 'one');
      expect(last()).toEqual({ role: 'error', content: 'Usage: /compare <a> <b>' });
    });

    it('masks the password when asked', () => {
      run('/check', 'Ab1!Ab1!', true);
      expect(last().content.split('\n').slice(0, 3)).toEqual([
        'Password:  ********',
        'Strength:  [█████]  5/5 · strong (100%)',
        'Strong password!',
      ]);
    });

    it('prints the breakdown', () => {
      run('/details', 'aB3@');
      expect(last().content.split('\n')[1]).toBe('Length:        4  (4 unique)');
    });

    it('compares two passwords', () => {
      run('/compare', 'abc Ab1!Ab1!');
      expect(last().content).toBe('1. abc  1/5 · weak\n2. Ab1!Ab1!  5/5 · strong\nStronger: Ab1!Ab1!');
    });

    it('compares quoted passwords with spaces', () => {
      run('/compare', '"correct horse" Ab1!Ab1!');
      expect(last().content).toBe(
        '1. correct horse  2/5 · weak\n2. Ab1!Ab1!  5/5 · strong\nStronger: Ab1!Ab1!',
      );
    });
  });

  describe('typed passwords', () => {
    it('scores the text as typed, trailing space included', () => {
      const input = parseInput('Abc1!xy ');
      expect(input).toEqual({ kind: 'password', password: 'Abc1!xy ' });
      if (input.kind !== 'password') return;

      checkPassword(ctx(), input.password);
      expect(last().content.split('\n').slice(0, 2)).toEqual([
        'Password:  Abc1!xy ',
        'Strength:  [█████]  5/5 · strong (100%)',
      ]);
    });
  });

  describe('/history', () => {
    it('says so when empty instead of opening the screen', () => {
      run('/history');
      expect(last()).toEqual({ role: 'system', content: 'No passwords in history yet.' });
      expect(screens).toEqual([]);
    });

    it('opens the screen once there are entries', () => {
      services.history.addPasswordWithStrength('Ab1!Ab1!', 'strong');
      run('/history');
      expect(screens).toEqual(['history']);
    });

    it('prints, removes and clears', () => {
      services.history.addPasswordWithStrength('Ab1!Ab1!', 'strong');
      services.history.addPasswordWithStrength('Zz9#Zz9#', 'strong');

      run('/history', '1');
      expect(last().content).toMatch(/^ {3}1\. {2}Zz9#Zz9# {2}\(strong\) {2}\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/);

      run('/history', 'rm nope');
      expect(last()).toEqual({ role: 'error', content: 'Not in history: nope' });

      run('/history', 'rm Ab1!Ab1!');
      expect(last().content).toBe('Removed from history.');
      expect(services.history.getAll()).toEqual(['Zz9#Zz9#']);

      run('/history', 'clear');
      expect(last().content).toBe('History cleared.');
      expect(services.history.isEmpty()).toBe(true);
    });

    it('rejects unknown subcommands', () => {
      run('/history', 'purge');
      expect(last()).toEqual({ role: 'error', content: 'Usage: /history [N | clear | rm <password>]' });
    });
  });

  describe('housekeeping', () => {
    it('exits, clears and reports the version', () => {
      run('/exit');
      run('/quit');
      run('/clear');
      expect(exits).toBe(2);
      expect(clears).toBe(1);

      run('/version');
      expect(last().content).toBe('PassKit v1.0.0');
    });

    it('lists every command in /help', () => {
      run('/help');
      const text = last().content;
      expect(text.split('\n')[0]).toBe('Commands:');
      for (const c of COMMANDS) expect(text).toContain(c.usage);
    });

    it('shows the effective config', () => {
      run('/config');
      expect(last().content.split('\n')[1]).toBe('  Default length:   14');
    });

    it('flags unknown commands', () => {
      run('/foo');
      expect(last()).toEqual({ role: 'error', content: 'Unknown command: /foo  (type /help)' });
    });
  });
});

describe('parseInput', () => {
  it('ignores blank input', () => {
    expect(parseInput('   ')).toEqual({ kind: 'empty' });
  });

  it('splits a command from its argument', () => {
    expect(parseInput('  /gen 20 ')).toEqual({ kind: 'command', cmd: '/gen', arg: '20' });
    expect(parseInput('/help')).toEqual({ kind: 'command', cmd: '/help', arg: '' });
  });

  it('keeps surrounding whitespace of a password', () => {
    expect(parseInput(' pass word ')).toEqual({ kind: 'password', password: ' pass word ' });
  });
});

describe('splitArgs', () => {
  it('keeps quoted words together', () => {
    expect(splitArgs('"a b"  c')).toEqual(['a b', 'c']);
    expect(splitArgs('x y')).toEqual(['x', 'y']);
    expect(splitArgs('  ')).toEqual([]);
  });
});

describe('parseLength', () => {
  it('distinguishes empty from invalid', () => {
    expect(parseLength('')).toBeUndefined();
    expect(parseLength(' 12 ')).toBe(12);
    expect(parseLength('0')).toBeNull();
    expect(parseLength('1.5')).toBeNull();
  });
});

describe('parseReqArgs', () => {
  it('turns flags into classes', () => {
    expect(parseReqArgs('--length 10 --no-symbols')).toEqual({
      length: 10,
      classes: { lower: true, upper: true, digits: true, symbols: false },
    });
  });

  it('ignores a bad length', () => {
    expect(parseReqArgs('--length x').length).toBeUndefined();
    expect(parseReqArgs('').classes).toEqual({ lower: true, upper: true, digits: true, symbols: true });
  });
});
