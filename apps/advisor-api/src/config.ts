/**
 * Environment configuration, validated once at startup.
 */

import { z } from 'zod';

const int = (fallback: number) => z.coerce.number().int().default(fallback);

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    ADVISOR_API_PORT: int(8080).pipe(z.number().min(0).max(65535)),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
    DEFAULT_TRIALS: int(1000).pipe(z.number().min(1)),
    MAX_TRIALS: int(20_000).pipe(z.number().min(1)),
    MAX_ENUMERATION: int(250_000).pipe(z.number().min(0)),
    RATE_LIMIT_MAX: int(100).pipe(z.number().min(1)),
    RATE_LIMIT_WINDOW: int(60_000).pipe(z.number().min(1)),
    CORS_ORIGINS: z.string().optional(),
  })
  .refine((env) => env.DEFAULT_TRIALS <= env.MAX_TRIALS, {
    message: 'DEFAULT_TRIALS must not exceed MAX_TRIALS',
    path: ['DEFAULT_TRIALS'],
  });

export interface SimulationLimits {
  defaultTrials: number;
  maxTrials: number;
  maxEnumeration: number;
}

export interface AdvisorConfig extends SimulationLimits {
  env: 'development' | 'production' | 'test';
  port: number;
  /** Defaults to silent under test, info otherwise */
  logLevel: LogLevel;
  rateLimit: { max: number; windowMs: number };
  corsOrigins: string[];
}

function corsOrigins(env: 'development' | 'production' | 'test', raw: string | undefined): string[] {
  const origins = raw
    ?.split(',')
    .map((o) => o.trim())
    .filter(Boolean);
  if (env === 'production') {
    if (!origins || origins.length === 0) {
      throw new Error('CORS_ORIGINS must be set in production. Example: CORS_ORIGINS=https://example.com');
    }
    if (origins.includes('*')) {
      throw new Error('CORS_ORIGINS must not contain wildcard (*) in production.');
    }
  }
  return origins && origins.length > 0 ? origins : ['http://localhost:3000'];
}

export function loadConfig(source: Record<string, string | undefined> = process.env): AdvisorConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    port: env.ADVISOR_API_PORT,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : 'info'),
    defaultTrials: env.DEFAULT_TRIALS,
    maxTrials: env.MAX_TRIALS,
    maxEnumeration: env.MAX_ENUMERATION,
    rateLimit: { max: env.RATE_LIMIT_MAX, windowMs: env.RATE_LIMIT_WINDOW },
    corsOrigins: corsOrigins(env.NODE_ENV, env.CORS_ORIGINS),
  };
}
