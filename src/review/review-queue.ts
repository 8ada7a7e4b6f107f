import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import type { HealingStats, TestCase } from '../types/index.js';
import { ReviewStoreSchema, type ReviewChangesSchema, type ReviewEntrySchema } from '../schemas/index.js';
import { ReviewNotFoundError } from '../exception/errors.js';

export type ReviewEntry = z.infer<typeof ReviewEntrySchema>;
export type ReviewChanges = z.infer<typeof ReviewChangesSchema>;
type ReviewStore = z.infer<typeof ReviewStoreSchema>;

export interface ReviewDecision {
  approved: boolean;
  reviewer?: string;
  comment?: string;
  /** Edits the reviewer made to the healed test case before deciding. */
  changes?: ReviewChanges;
}

export interface ReviewStats {
  total: number;
  pending: number;
  approved: number;
  rejected: number;
  approvalRate: number;
}

/**
 * Holds healed test cases until a human approves or rejects them.
 * Backed by a single JSON file, loaded lazily and rewritten on every change.
 */
export class ReviewQueue {
  private loading: Promise<ReviewStore> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(private filePath: string) {}

  private load(): Promise<ReviewStore> {
    this.loading ??= this.read().catch((error: unknown) => {
      this.loading = null;
      throw error;
    });
    return this.loading;
  }

  private async read(): Promise<ReviewStore> {
    let raw: string | null = null;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
    }
    return raw === null ? { entries: [] } : ReviewStoreSchema.parse(JSON.parse(raw));
  }

  // Writes land in call order, one at a time.
  private save(store: ReviewStore): Promise<void> {
    const write = this.writes.then(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify(store, null, 2), 'utf-8');
    });
    this.writes = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  /** Queue a test case for review and return the review id. */
  async queue(testCase: TestCase, stats?: HealingStats): Promise<string> {
    const store = await this.load();
    const id = randomUUID();

    store.entries.push({
      id,
      testCase: { id: testCase.id, title: testCase.title, steps: [...testCase.steps] },
      stats: stats ? { ...stats } : undefined,
      status: 'pending',
      queuedAt: new Date().toISOString(),
    });

    await this.save(store);
    return id;
  }

  async listPending(): Promise<TestCase[]> {
    const store = await this.load();
    return store.entries.filter((e) => e.status === 'pending').map((e) => e.testCase);
  }

  async getEntry(id: string): Promise<ReviewEntry> {
    const store = await this.load();
    const entry = store.entries.find((e) => e.id === id);
    if (!entry) throw new ReviewNotFoundError(id);
    return entry;
  }

  /**
   * Record a reviewer's decision. Changes are applied to the stored test case
   * first; the updated test case is returned.
   */
  async submitReview(id: string, decision: ReviewDecision): Promise<TestCase> {
    const entry = await this.getEntry(id);

    if (decision.changes?.title !== undefined) entry.testCase.title = decision.changes.title;
    if (decision.changes?.steps !== undefined) entry.testCase.steps = [...decision.changes.steps];

    entry.status = decision.approved ? 'approved' : 'rejected';
    entry.reviewer = decision.reviewer;
    entry.comment = decision.comment;
    entry.reviewedAt = new Date().toISOString();

    await this.save(await this.load());
    return entry.testCase;
  }

  async getStats(): Promise<ReviewStats> {
    const store = await this.load();
    const count = (status: ReviewEntry['status']) =>
      store.entries.filter((e) => e.status === status).length;

    const approved = count('approved');
    const rejected = count('rejected');
    const decided = approved + rejected;

    return {
      total: store.entries.length,
      pending: count('pending'),
      approved,
      rejected,
      approvalRate: decided > 0 ? approved / decided : 0,
    };
  }
}
