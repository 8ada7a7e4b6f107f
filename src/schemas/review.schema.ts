import { z } from 'zod';
import { HealingStatsSchema, TestCaseSchema } from './test-case.schema.js';

export const ReviewStatusSchema = z.enum(['pending', 'approved', 'rejected']);

export const ReviewChangesSchema = z.object({
  title: z.string().optional(),
  steps: z.array(z.string()).optional(),
});

export const ReviewEntrySchema = z.object({
  id: z.string(),
  testCase: TestCaseSchema,
  stats: HealingStatsSchema.optional(),
  status: ReviewStatusSchema,
  reviewer: z.string().optional(),
  comment: z.string().optional(),
  queuedAt: z.string(),
  reviewedAt: z.string().optional(),
});

export const ReviewStoreSchema = z.object({
  entries: z.array(ReviewEntrySchema),
});
