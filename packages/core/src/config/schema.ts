// packages/core/src/config/schema.ts

import { z } from 'zod';
import { DEFAULT_FRAME_RATE, DEFAULT_MAX_ROUTINE_DURATION, MAX_SEED } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const engineSettingsSchema = z.object({
  frameRate: z.number().positive().max(1000).default(DEFAULT_FRAME_RATE),
  maxRoutineDuration: z.number().nonnegative().default(DEFAULT_MAX_ROUTINE_DURATION),
  seed: z.number().int().min(0).max(MAX_SEED).nullable().default(null),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const engineConfigSchema = z.object({
  engine: engineSettingsSchema.default({}),
  advanced: advancedConfigSchema.default({}),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof engineConfigSchema> {
  const result = engineConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
