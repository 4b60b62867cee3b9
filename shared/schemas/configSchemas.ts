import { z } from 'zod';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variables read by the store. Every key is optional; the
 * defaults match the dashboard's original behaviour.
 */
export const StoreEnvSchema = z.object({
  RESEARCH_DB_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(['trace', 'debug', 'info', 'warn', 'error']).optional()
  ),
  CACHE_TTL_HOURS: z.coerce.number().nonnegative().default(24),
  CACHE_SINGLE_FLIGHT: booleanFromEnv.default('true'),
  COST_RATE_IN: z.coerce.number().nonnegative().default(0.01),
  COST_RATE_OUT: z.coerce.number().nonnegative().default(0.03),
  TELEMETRY_RETENTION_DAYS: z.coerce.number().positive().default(90),
  CONFIRMATION_WINDOW_MS: z.coerce.number().int().positive().default(10_000),
});

export type StoreEnv = z.infer<typeof StoreEnvSchema>;
