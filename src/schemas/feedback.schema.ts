import { z } from 'zod';

export const FeedbackTypeSchema = z.enum([
  'test_quality',
  'coverage',
  'clarity',
  'maintainability',
  'healing',
]);

export const FeedbackSchema = z.object({
  testId: z.string().min(1),
  type: FeedbackTypeSchema,
  rating: z.number().int().min(1).max(5),
  comment: z.string().optional(),
});

export const FeedbackRecordSchema = FeedbackSchema.extend({
  recordedAt: z.string(),
});
