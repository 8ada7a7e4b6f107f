import { z } from 'zod';

export const SuggestionServiceSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string().optional(),
  timeoutMs: z.number().int().positive().default(15000),
});

export const HealingConfigSchema = z.object({
  similarityCutoff: z.number().min(0).max(1).default(0.8),
  structuralCutoff: z.number().min(0).max(1).default(0.5),
  exactCheckTimeoutMs: z.number().int().positive().max(1000).default(1000),
  strategyTimeoutMs: z.number().int().positive().default(5000),
  modelTimeoutMs: z.number().int().positive().default(15000),
  verifyCandidates: z.boolean().default(true),
  maxModelCallsPerRun: z.number().int().nonnegative().default(10),
  labels: z.record(z.string()).default({}),
  historyPath: z.string().optional(),
  suggestionService: SuggestionServiceSchema.optional(),
});
