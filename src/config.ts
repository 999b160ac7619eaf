import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { DEFAULT_LENGTH, DEFAULT_SYMBOLS } from './features/generator';
import { LOG_LEVELS } from './utils/logger';
import { readFile } from './utils/fs';

export const DATA_DIR = join(homedir(), '.passkit');
export const DEFAULT_CONFIG_PATH = join(DATA_DIR, 'config.json');

export const HISTORY_LIMIT = 10;

export const ConfigSchema = z.object({
  length:       z.number().int().positive().default(DEFAULT_LENGTH),
  symbols:      z.string().min(1).default(DEFAULT_SYMBOLS),
  historyFile:  z.string().min(1).default(join(DATA_DIR, 'history.json')),
  historyLimit: z.number().int().positive().default(HISTORY_LIMIT),
  logFile:      z.string().min(1).default(join(DATA_DIR, 'passkit.log')),
  logLevel:     z.enum(LOG_LEVELS).default('warn'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface LoadedConfig {
  config: AppConfig;
  path: string;
  issues: string[];
}

/**
 * Missing file gives the defaults. A file that is not JSON or does not match
 * the schema also gives the defaults, with the problems listed in `issues`.
 */
export function loadConfig(path: string = DEFAULT_CONFIG_PATH): LoadedConfig {
  const defaults = ConfigSchema.parse({});
  const text = readFile(path);
  if (text === null) return { config: defaults, path, issues: [] };

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return { config: defaults, path, issues: [`${path}: ${(e as Error).message}`] };
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${path}: ${i.path.join('.') || '(root)'}: ${i.message}`);
    return { config: defaults, path, issues };
  }
  return { config: parsed.data, path, issues: [] };
}
