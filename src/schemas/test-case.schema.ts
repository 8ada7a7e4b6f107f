import { z } from 'zod';

export const TestCaseSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  steps: z.array(z.string()),
});

export const HealingStatsSchema = z.object({
  healed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
});
