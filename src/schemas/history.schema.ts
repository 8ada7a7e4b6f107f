import { z } from 'zod';

/** Persisted healing history: original locator -> healed locator. */
export const HealingHistoryFileSchema = z.record(z.string().min(1));
