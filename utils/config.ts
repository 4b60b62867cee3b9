import dotenv from 'dotenv';
import { StoreEnvSchema } from '../shared/schemas/configSchemas';
import { MalformedInputError } from '../services/base/ServiceError';
import type { CostRates } from '../shared/types';
import { logger } from './logger';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface StoreConfig {
  /** Database file path, or ':memory:'. Undefined means use getDbPath(). */
  dbPath?: string;
  cacheTtlMs: number;
  singleFlight: boolean;
  costRates: CostRates;
  telemetryRetentionMs: number;
  confirmationWindowMs: number;
}

export const DEFAULT_COST_RATES: CostRates = { inputPer1k: 0.01, outputPer1k: 0.03 };

/**
 * Builds the store configuration from environment variables.
 * Loads `.env` from the working directory first unless `loadDotenv` is false.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: { loadDotenv?: boolean } = {}
): StoreConfig {
  if (options.loadDotenv ?? env === process.env) {
    const result = dotenv.config();
    if (result.error) {
      logger.debug('[Config] No .env file loaded:', result.error.message);
    }
  }

  const parsed = StoreEnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new MalformedInputError(`Invalid store configuration: ${keys.join(', ')}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const values = parsed.data;
  return {
    dbPath: values.RESEARCH_DB_PATH,
    cacheTtlMs: values.CACHE_TTL_HOURS * HOUR_MS,
    singleFlight: values.CACHE_SINGLE_FLIGHT,
    costRates: { inputPer1k: values.COST_RATE_IN, outputPer1k: values.COST_RATE_OUT },
    telemetryRetentionMs: values.TELEMETRY_RETENTION_DAYS * DAY_MS,
    confirmationWindowMs: values.CONFIRMATION_WINDOW_MS,
  };
}

export { HOUR_MS, DAY_MS };
