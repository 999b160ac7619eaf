import { z } from 'zod';
import { readFile, writeJson } from '../utils/fs';
import type { Logger } from '../utils/logger';

export const HistoryEntrySchema = z.object({
  password:  z.string().min(1),
  timestamp: z.string(),
  strength:  z.enum(['weak', 'medium', 'strong', 'unknown']),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;
export type HistoryStrength = HistoryEntry['strength'];

const HistoryFileSchema = z.array(HistoryEntrySchema);

export interface HistoryOptions {
  file: string;
  limit: number;
  logger: Logger;
  now?: () => Date;
}

/**
 * Bounded log of saved passwords backed by a JSON file. Every mutation rewrites
 * the file; a failed write is logged and the in-memory list stays current.
 */
export class PasswordHistory {
  private entries: HistoryEntry[] = [];
  private readonly file: string;
  private readonly limit: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: HistoryOptions) {
    this.file   = opts.file;
    this.limit  = opts.limit;
    this.logger = opts.logger.child({ component: 'history' });
    this.now    = opts.now ?? (() => new Date());
    this.load();
  }

  addPassword(password: string): boolean {
    return this.addPasswordWithStrength(password, 'unknown');
  }

  /** False for an empty password or one already stored. */
  addPasswordWithStrength(password: string, strength: HistoryStrength): boolean {
    if (!password) return false;
    if (this.entries.some(e => e.password === password)) return false;

    this.entries.push({ password, timestamp: this.now().toISOString(), strength });
    while (this.entries.length > this.limit) this.entries.shift();

    this.save();
    return true;
  }

  getAll(): string[] {
    return this.entries.map(e => e.password);
  }

  getAllWithMetadata(): HistoryEntry[] {
    return this.entries.map(e => ({ ...e }));
  }

  /** Last `count` passwords, oldest first. */
  getRecent(count = 5): string[] {
    return this.getRecentWithMetadata(count).map(e => e.password);
  }

  getRecentWithMetadata(count = 5): HistoryEntry[] {
    if (count <= 0) return [];
    return this.entries.slice(-count).map(e => ({ ...e }));
  }

  removePassword(password: string): boolean {
    const idx = this.entries.findIndex(e => e.password === password);
    if (idx === -1) return false;
    this.entries.splice(idx, 1);
    this.save();
    return true;
  }

  clearHistory(): void {
    this.entries = [];
    this.save();
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  count(): number {
    return this.entries.length;
  }

  getLimit(): number {
    return this.limit;
  }

  private load(): void {
    const text = readFile(this.file);
    if (text === null) return;

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      this.logger.warn('history file is not valid JSON, starting empty', {
        file: this.file, error: (e as Error).message,
      });
      return;
    }

    const parsed = HistoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('history file has unexpected shape, starting empty', {
        file: this.file, issues: parsed.error.issues.length,
      });
      return;
    }

    this.entries = parsed.data.slice(-this.limit);
    this.logger.debug('history loaded', { file: this.file, count: this.entries.length });
  }

  private save(): void {
    try {
      writeJson(this.file, this.entries);
    } catch (e) {
      this.logger.error('failed to save history', { file: this.file, error: (e as Error).message });
    }
  }
}
