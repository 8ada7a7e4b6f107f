import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Locator } from '../types/index.js';
import { HealingHistoryFileSchema } from '../schemas/index.js';
import { HealingHistoryError } from '../exception/errors.js';

/**
 * HealingHistory remembers, per original locator, the locator that last healed it.
 * One instance is created at startup and handed to every engine that should share it.
 *
 * Entries are only ever added or overwritten: a newer heal for the same original
 * replaces the older one. With a file path, the map can be loaded from and saved
 * to a flat JSON object of original -> healed strings.
 */
export class HealingHistory {
  private entries = new Map<Locator, Locator>();

  constructor(private filePath?: string) {}

  /** Create a history and load it from `filePath` when one is given. */
  static async open(filePath?: string): Promise<HealingHistory> {
    const history = new HealingHistory(filePath);
    await history.load();
    return history;
  }

  async load(): Promise<void> {
    if (!this.filePath) return;

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      throw new HealingHistoryError(
        `Healing history at ${this.filePath} is not valid JSON`,
        this.filePath,
      );
    }

    const parsed = HealingHistoryFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new HealingHistoryError(
        `Malformed healing history at ${this.filePath}: ${parsed.error.message}`,
        this.filePath,
      );
    }
    this.entries = new Map(Object.entries(parsed.data));
  }

  async save(): Promise<void> {
    if (!this.filePath) return;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(this.toJSON(), null, 2), 'utf-8');
  }

  get(original: Locator): Locator | undefined {
    return this.entries.get(original);
  }

  has(original: Locator): boolean {
    return this.entries.has(original);
  }

  set(original: Locator, healed: Locator): void {
    if (!original || !healed) {
      throw new HealingHistoryError(
        `Refusing to store an empty locator (${JSON.stringify(original)} -> ${JSON.stringify(healed)})`,
      );
    }
    this.entries.set(original, healed);
  }

  delete(original: Locator): boolean {
    return this.entries.delete(original);
  }

  get size(): number {
    return this.entries.size;
  }

  list(): Array<[Locator, Locator]> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.clear();
  }

  toJSON(): Record<Locator, Locator> {
    return Object.fromEntries(this.entries);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
