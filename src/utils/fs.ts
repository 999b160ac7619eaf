import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';

export function readFile(path: string): string | null {
  try { return readFileSync(path, 'utf-8'); } catch { return null; }
}

/** Rewrites the whole file, creating missing parent directories. Throws on failure. */
export function writeJson(path: string, data: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(data, null, 2) + '\n', 'utf-8');
}
