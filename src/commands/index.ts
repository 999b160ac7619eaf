import { useCallback } from 'react';
import { version as VERSION } from '../../package.json';
import { ALL_CLASSES } from '../features/generator';
import type { CharClasses } from '../features/generator';
import { getPatternReport } from '../features/patterns';
import {
  formatAnalysis, formatComparison, formatDetails, formatHistory,
} from '../features/report';
import { checkStrength, comparePasswords, getDetailedAnalysis } from '../features/strength';
import type { AppServices } from '../services';
import type { MessageRole, Screen } from '../types';

export interface CommandSpec {
  name: string;
  usage: string;
  description: string;
  showInTips: boolean;
}

export const COMMANDS: CommandSpec[] = [
  { name: '/gen',       usage: '/gen [N]',                 description: 'random password',                  showInTips: true },
  { name: '/pattern',   usage: '/pattern <LUNS…>',         description: 'password from a pattern',          showInTips: true },
  { name: '/req',       usage: '/req [--length N] [--no-lower] [--no-upper] [--no-digits] [--no-symbols]',
                                                            description: 'one of each enabled class',        showInTips: false },
  { name: '/memorable', usage: '/memorable [N]',           description: 'pronounceable password',           showInTips: true },
  { name: '/check',     usage: '/check <password>',        description: 'strength and pattern report',      showInTips: true },
  { name: '/details',   usage: '/details <password>',      description: 'character breakdown',              showInTips: false },
  { name: '/compare',   usage: '/compare <a> <b>',         description: 'which of two is stronger ("…" for spaces)',showInTips: false },
  { name: '/length',    usage: '/length [N]',              description: 'show or set default length',       showInTips: false },
  { name: '/history',   usage: '/history [N | clear | rm <password>]',
                                                            description: 'saved strong passwords',           showInTips: true },
  { name: '/config',    usage: '/config',                  description: 'effective settings',               showInTips: false },
  { name: '/version',   usage: '/version',                 description: 'application version',              showInTips: false },
  { name: '/help',      usage: '/help',                    description: 'this list',                        showInTips: true },
  { name: '/clear',     usage: '/clear',                   description: 'clear the screen',                 showInTips: false },
  { name: '/exit',      usage: '/exit',                    description: 'quit',                             showInTips: false },
];

export const MAX_LENGTH = 512;

type AddFn = (role: MessageRole, content: string) => void;

export interface CommandContext {
  services: AppServices;
  add: AddFn;
  clear: () => void;
  exit: () => void;
  openScreen: (s: Screen) => void;
  masked?: boolean;
}

export type ParsedInput =
  | { kind: 'empty' }
  | { kind: 'command'; cmd: string; arg: string }
  | { kind: 'password'; password: string };

/** Slash commands are trimmed; anything else is a password and keeps its whitespace. */
export function parseInput(text: string): ParsedInput {
  const t = text.trim();
  if (!t) return { kind: 'empty' };
  if (!t.startsWith('/')) return { kind: 'password', password: text };

  const sp = t.indexOf(' ');
  return sp === -1
    ? { kind: 'command', cmd: t, arg: '' }
    : { kind: 'command', cmd: t.slice(0, sp), arg: t.slice(sp + 1).trim() };
}

/** undefined for an empty argument, null when it is not a usable length. */
export function parseLength(arg: string): number | null | undefined {
  const t = arg.trim();
  if (!t) return undefined;
  if (!/^\d+$/.test(t)) return null;
  const n = parseInt(t, 10);
  return n >= 1 && n <= MAX_LENGTH ? n : null;
}

export function parseReqArgs(arg: string): { length: number | undefined; classes: CharClasses } {
  const parts = arg.trim().split(/\s+/);
  const classes: CharClasses = { ...ALL_CLASSES };
  let length: number | undefined;

  for (let i = 0; i < parts.length; i++) {
    const p = parts[i];
    if (p === '--no-lower')   classes.lower   = false;
    if (p === '--no-upper')   classes.upper   = false;
    if (p === '--no-digits')  classes.digits  = false;
    if (p === '--no-symbols') classes.symbols = false;
    if (p === '--length' && parts[i + 1]) {
      const n = parseLength(parts[++i]);
      if (n) length = n;
    }
  }

  return { length, classes };
}

/** Whitespace-separated words; `"a b"` keeps its spaces. */
export function splitArgs(arg: string): string[] {
  return [...arg.matchAll(/"([^"]*)"|(\S+)/g)].map(m => m[1] ?? m[2] ?? '');
}

const display = (ctx: CommandContext, password: string) =>
  ctx.masked ? '*'.repeat(password.length) : password;

// ─── общие шаги ─────────────────────────────────────────────────────────────

/** Reports on a fresh password and saves it to history when it scores strong. */
function presentGenerated(ctx: CommandContext, password: string): void {
  if (!password) {
    ctx.add('error', 'Nothing generated: enable at least one character class.');
    return;
  }

  const strength = checkStrength(password);
  let text = formatAnalysis(password, strength, getPatternReport(password));

  if (strength.level === 'strong' &&
      ctx.services.history.addPasswordWithStrength(password, strength.level)) {
    text += '\n\nSaved to history.';
  }
  ctx.add('system', text);
}

export function checkPassword(ctx: CommandContext, password: string): void {
  ctx.add('system', formatAnalysis(display(ctx, password), checkStrength(password), getPatternReport(password)));
}

function historyCommand(ctx: CommandContext, arg: string): void {
  const { history } = ctx.services;
  const [sub, ...rest] = arg.split(/\s+/).filter(Boolean);

  if (!sub) {
    if (history.isEmpty()) ctx.add('system', formatHistory([]));
    else ctx.openScreen('history');
    return;
  }

  if (sub === 'clear') {
    history.clearHistory();
    ctx.add('system', 'History cleared.');
    return;
  }

  if (sub === 'rm') {
    const password = rest.join(' ');
    if (!password) { ctx.add('error', 'Usage: /history rm <password>'); return; }
    if (history.removePassword(password)) ctx.add('system', 'Removed from history.');
    else ctx.add('error', 'Not in history: ' + password);
    return;
  }

  if (/^\d+$/.test(sub)) {
    ctx.add('system', formatHistory(history.getRecentWithMetadata(parseInt(sub, 10))));
    return;
  }

  ctx.add('error', 'Usage: /history [N | clear | rm <password>]');
}

// ─── диспетчер ──────────────────────────────────────────────────────────────

export function runCommand(ctx: CommandContext, cmd: string, arg: string): void {
  const { services, add } = ctx;
  const { generator } = services;

  switch (cmd) {
    case '/exit':
    case '/quit':
      ctx.exit();
      break;

    case '/clear':
      ctx.clear();
      break;

    case '/help': {
      const width = Math.max(...COMMANDS.map(c => c.usage.length));
      add('system', [
        'Commands:',
        '',
        ...COMMANDS.map(c => '  ' + c.usage.padEnd(width) + '   ' + c.description),
        '',
        'Anything typed without a leading / is checked as a password.',
        'Ctrl+T hides or shows what you type.',
      ].join('\n'));
      break;
    }

    case '/version':
      add('system', 'PassKit v' + VERSION);
      break;

    case '/config': {
      const { config } = services;
      add('system', [
        'Settings:',
        '  Default length:   ' + generator.getLength(),
        '  Symbols:          ' + config.symbols,
        '  History file:     ' + config.historyFile,
        '  History limit:    ' + config.historyLimit,
        '  Log file:         ' + config.logFile,
        '  Log level:        ' + config.logLevel,
      ].join('\n'));
      break;
    }

    case '/gen':
    case '/memorable': {
      const length = parseLength(arg);
      if (length === null) { add('error', `Length must be an integer between 1 and ${MAX_LENGTH}`); break; }
      presentGenerated(ctx, cmd === '/gen' ? generator.generate(length) : generator.generateMemorable(length));
      break;
    }

    case '/pattern': {
      const pattern = arg.trim();
      if (!generator.validatePattern(pattern)) {
        add('error', 'Invalid pattern: use only L, U, N, S');
        break;
      }
      presentGenerated(ctx, generator.generateFromPattern(pattern));
      break;
    }

    case '/req': {
      const { length, classes } = parseReqArgs(arg);
      presentGenerated(ctx, generator.generateWithRequirements(length, classes));
      break;
    }

    case '/length': {
      if (!arg.trim()) { add('system', 'Default length: ' + generator.getLength()); break; }
      const length = parseLength(arg);
      if (!length) { add('error', `Length must be an integer between 1 and ${MAX_LENGTH}`); break; }
      generator.setLength(length);
      add('system', 'Default length set to ' + generator.getLength());
      break;
    }

    case '/check':
      if (!arg) { add('error', 'Usage: /check <password>'); break; }
      checkPassword(ctx, arg);
      break;

    case '/details':
      if (!arg) { add('error', 'Usage: /details <password>'); break; }
      add('system', formatDetails(display(ctx, arg), getDetailedAnalysis(arg)));
      break;

    case '/compare': {
      const parts = splitArgs(arg);
      if (parts.length !== 2) { add('error', 'Usage: /compare <a> <b>'); break; }
      const [a, b] = parts;
      add('system', formatComparison(display(ctx, a), display(ctx, b), comparePasswords(a, b)));
      break;
    }

    case '/history':
      historyCommand(ctx, arg);
      break;

    default:
      add('error', 'Unknown command: ' + cmd + '  (type /help)');
  }
}

export function useCommands(
  services: AppServices,
  add: AddFn,
  clear: () => void,
  exit: () => void,
  openScreen: (s: Screen) => void,
  masked: boolean,
) {
  return useCallback((cmd: string, arg: string) => {
    runCommand({ services, add, clear, exit, openScreen, masked }, cmd, arg);
  }, [services, add, clear, exit, openScreen, masked]);
}
