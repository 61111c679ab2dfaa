import { z } from 'zod';
import type { EnvConfig } from '../types';

/**
 * Comma separated list → trimmed, non-empty entries
 */
const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: commaList('*'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // Pipeline settings
  VENDOR_DOMAIN: z.string().min(1).default('amazon.ca'),
  MEMO_MAX_LENGTH: z.coerce.number().int().positive().default(200),
  MATCH_DAYS_BEFORE: z.coerce.number().int().nonnegative().default(7),
  MATCH_DAYS_AFTER: z.coerce.number().int().nonnegative().default(2),
  AMOUNT_TOLERANCE_CENTS: z.coerce.number().int().nonnegative().default(0),
  VENDOR_PAYEE_KEYWORDS: commaList('amazon,amzn,amz'),
});

/**
 * Parse and validate environment variables.
 * Throws at start-up with every offending variable listed.
 */
export const loadEnv = (source: NodeJS.ProcessEnv = process.env): EnvConfig => {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return Object.freeze(result.data);
};

export const env: EnvConfig = loadEnv();

export { pipelineSettingsFromEnv } from './pipeline';
export type { PipelineSettings } from './pipeline';

export default env;
