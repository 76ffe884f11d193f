import path from 'path';
import { z } from 'zod';

const DEFAULT_SEED_FILE = path.resolve(__dirname, '../../resources/data.json');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3001),
  DATA_FILE: z.string().min(1).default('data/data.json'),
  SEED_FILE: z.string().min(1).default(DEFAULT_SEED_FILE),
  CORS_ORIGIN: z.string().optional(),
  CHILD_AGE_THRESHOLD: z.coerce.number().int().nonnegative().default(18),
  RATE_LIMIT_MAX: positiveInt(100),
  RATE_LIMIT_WINDOW_MS: positiveInt(15 * 60 * 1000),
});

export interface AppConfig {
  env: string;
  port: number;
  dataFile: string;
  seedFile: string;
  /** Empty means every origin is allowed. */
  corsOrigins: string[];
  childAgeThreshold: number;
  rateLimit: {
    max: number;
    windowMs: number;
  };
}

/**
 * Build the typed configuration from environment variables. Throws a
 * ZodError when a value is malformed.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    dataFile: path.resolve(parsed.DATA_FILE),
    seedFile: path.resolve(parsed.SEED_FILE),
    corsOrigins: (parsed.CORS_ORIGIN ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    childAgeThreshold: parsed.CHILD_AGE_THRESHOLD,
    rateLimit: {
      max: parsed.RATE_LIMIT_MAX,
      windowMs: parsed.RATE_LIMIT_WINDOW_MS,
    },
  };
};
