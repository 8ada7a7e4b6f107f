import { readFile } from 'node:fs/promises';
import type { HealingConfig } from '../types/index.js';
import { HealingConfigSchema } from '../schemas/index.js';

export const DEFAULT_HEALING_CONFIG: HealingConfig = HealingConfigSchema.parse({});

/** Fill in defaults for anything `overrides` leaves out, validating what it sets. */
export function resolveHealingConfig(overrides: Partial<HealingConfig> = {}): HealingConfig {
  return HealingConfigSchema.parse(overrides);
}

export async function loadHealingConfig(filePath: string): Promise<HealingConfig> {
  const raw = await readFile(filePath, 'utf-8');
  return HealingConfigSchema.parse(JSON.parse(raw));
}
