// =====================================================
// Application Configuration
// =====================================================

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

const intFromEnv = (fallback: number, min: number = 0) =>
  z
    .string()
    .optional()
    .transform((val, ctx) => {
      if (val === undefined || val.trim() === '') return fallback;
      const parsed = parseInt(val, 10);
      if (isNaN(parsed) || parsed < min) {
        const expected = min > 0 ? 'a positive integer' : 'a non-negative integer';
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected ${expected}, got "${val}"` });
        return z.NEVER;
      }
      return parsed;
    });

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Database
  DATABASE_URL: z.string().default('postgresql://localhost:5432/scoutline'),

  // Scouting API
  SCOUTING_API_BASE_URL: z.string().url().default('https://apiprod.transferroom.com/api/external'),
  SCOUTING_API_EMAIL: z.string().default(''),
  SCOUTING_API_PASSWORD: z.string().default(''),
  SCOUTING_API_LOGIN_TIMEOUT_MS: intFromEnv(30000),
  SCOUTING_API_FETCH_TIMEOUT_MS: intFromEnv(60000),
  SCOUTING_API_MAX_RETRIES: intFromEnv(3),
  SCOUTING_API_RETRY_DELAY_MS: intFromEnv(1000),

  // Ingestion
  INGEST_PAGE_SIZE: intFromEnv(10000, 1),
  INGEST_COMMIT_BATCH_SIZE: intFromEnv(100, 1),
  INGEST_PAGE_DELAY_MS: intFromEnv(500),
  COMPETITIONS_SOURCE: z.enum(['file', 'api']).default('file'),
  COMPETITIONS_FILE: z.string().default('data/competitions.json'),

  // Sentry
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
});

export function buildConfig(env: NodeJS.ProcessEnv) {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,

    // Database
    databaseUrl: e.DATABASE_URL,

    scoutingApi: {
      baseUrl: e.SCOUTING_API_BASE_URL,
      email: e.SCOUTING_API_EMAIL,
      password: e.SCOUTING_API_PASSWORD,
      loginTimeoutMs: e.SCOUTING_API_LOGIN_TIMEOUT_MS,
      fetchTimeoutMs: e.SCOUTING_API_FETCH_TIMEOUT_MS, // Bulk pages are large
      maxRetries: e.SCOUTING_API_MAX_RETRIES,
      initialRetryDelayMs: e.SCOUTING_API_RETRY_DELAY_MS,
    },

    ingest: {
      pageSize: e.INGEST_PAGE_SIZE,
      commitBatchSize: e.INGEST_COMMIT_BATCH_SIZE,
      pageDelayMs: e.INGEST_PAGE_DELAY_MS,
      competitionsSource: e.COMPETITIONS_SOURCE,
      competitionsFile: e.COMPETITIONS_FILE,
    },

    sentry: {
      dsn: e.SENTRY_DSN,
      environment: e.SENTRY_ENVIRONMENT ?? e.NODE_ENV,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;

export const config: AppConfig = buildConfig(process.env);

// Warn about credentials that only matter once a sync actually runs
export function validateConfig(appConfig: AppConfig = config): string[] {
  const missing: string[] = [];

  if (!appConfig.scoutingApi.email) missing.push('SCOUTING_API_EMAIL');
  if (!appConfig.scoutingApi.password) missing.push('SCOUTING_API_PASSWORD');

  return missing;
}
