// ============================================================
// Runtime Configuration (environment)
// ============================================================
// Read after `dotenv/config` has populated process.env.
// ============================================================

import { z } from 'zod';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export const RuntimeConfigSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  /** Directory for rotating log files; file logging is off when unset */
  LOG_DIR: z.string().min(1).optional(),
  MIN_SCORE: z.coerce.number().min(0).max(100).default(40),
  BUY_MIN_SCORE: z.coerce.number().min(0).max(100).default(50),
  SELL_MIN_SCORE: z.coerce.number().min(0).max(100).default(70),
  TOP_N: z.coerce.number().int().positive().default(10),
  CANDIDATES_FILE: z.string().min(1).optional(),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

/**
 * Parse runtime settings from an environment map.
 * Throws a ZodError listing every invalid variable.
 *
 * @param env - Defaults to process.env
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return RuntimeConfigSchema.parse(env);
}
