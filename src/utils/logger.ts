import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  bindings?: Record<string, unknown>;
  now?: () => Date;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const stderrSink: LogSink = line => { process.stderr.write(line); };

/** Appends to a file, falling back to stderr once the file turns out to be unwritable. */
export function fileSink(path: string): LogSink {
  let broken = false;
  return line => {
    if (!broken) {
      try {
        mkdirSync(dirname(path), { recursive: true });
        appendFileSync(path, line, 'utf-8');
        return;
      } catch (e) {
        broken = true;
        stderrSink(`log file ${path} is not writable: ${(e as Error).message}\n`);
      }
    }
    stderrSink(line);
  };
}

/** JSON lines: `{ level, msg, time, ...bindings, ...meta }`. */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const minLevel = opts.level ?? 'info';
  const sink     = opts.sink ?? stderrSink;
  const bindings = opts.bindings ?? {};
  const now      = opts.now ?? (() => new Date());

  const write = (level: LogLevel, msg: string, meta?: Record<string, unknown>) => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
    const entry = { level, msg, time: now().toISOString(), ...bindings, ...meta };
    sink(JSON.stringify(entry) + '\n');
  };

  return {
    debug: (msg, meta) => write('debug', msg, meta),
    info:  (msg, meta) => write('info', msg, meta),
    warn:  (msg, meta) => write('warn', msg, meta),
    error: (msg, meta) => write('error', msg, meta),
    child: extra => createLogger({ ...opts, bindings: { ...bindings, ...extra } }),
  };
}

/** Drops everything. */
export const silentLogger: Logger = createLogger({ sink: () => {} });
