import { readFile, appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod';
import {
  FeedbackRecordSchema,
  FeedbackSchema,
  type FeedbackTypeSchema,
} from '../schemas/index.js';

export type Feedback = z.infer<typeof FeedbackSchema>;
export type FeedbackRecord = z.infer<typeof FeedbackRecordSchema>;
export type FeedbackType = z.infer<typeof FeedbackTypeSchema>;

export interface FeedbackSummary {
  total: number;
  averageRating: number;
  byType: Partial<Record<FeedbackType, number>>;
}

/** Appends validated `{ testId, type, rating, comment }` feedback to a JSONL file. */
export class FeedbackCollector {
  constructor(private filePath: string) {}

  async record(feedback: Feedback): Promise<FeedbackRecord> {
    const entry: FeedbackRecord = {
      ...FeedbackSchema.parse(feedback),
      recordedAt: new Date().toISOString(),
    };
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
    return entry;
  }

  async list(testId?: string): Promise<FeedbackRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }

    const records = raw
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => FeedbackRecordSchema.parse(JSON.parse(line)));
    return testId === undefined ? records : records.filter((r) => r.testId === testId);
  }

  async summarize(testId?: string): Promise<FeedbackSummary> {
    const records = await this.list(testId);
    const byType: Partial<Record<FeedbackType, number>> = {};
    for (const record of records) {
      byType[record.type] = (byType[record.type] ?? 0) + 1;
    }

    return {
      total: records.length,
      averageRating:
        records.length > 0 ? records.reduce((sum, r) => sum + r.rating, 0) / records.length : 0,
      byType,
    };
  }
}
