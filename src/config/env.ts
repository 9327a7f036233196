/**
 * Environment configuration, validated on the first `getEnv()` call.
 */
import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  /** Longest silence allowed before headers or between body chunks. */
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  /** Backoff unit: attempt i waits 2^i of these. */
  BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(1_000),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT)
});

export type EnvConfig = z.infer<typeof envSchema>;

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): EnvConfig => {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`);
  }
  return result.data;
};

let cached: EnvConfig | undefined;

export const getEnv = (): EnvConfig => {
  if (!cached) {
    cached = loadEnv();
  }
  return cached;
};

export type LogSettings = Pick<EnvConfig, 'NODE_ENV' | 'LOG_LEVEL'>;

/** Read leniently: the logger exists before the environment is validated. */
export const readLogSettings = (source: NodeJS.ProcessEnv = process.env): LogSettings => {
  const nodeEnv = envSchema.shape.NODE_ENV.safeParse(source.NODE_ENV);
  const level = envSchema.shape.LOG_LEVEL.safeParse(source.LOG_LEVEL);
  return {
    NODE_ENV: nodeEnv.success ? nodeEnv.data : 'development',
    LOG_LEVEL: level.success ? level.data : 'warn'
  };
};
