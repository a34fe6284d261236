// apps/http/src/config.ts
import { z } from 'zod';
import { ValidationError, toIssues } from '@recset/core';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default(''),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  REPORT_MIN_DURATION: z.coerce.number().int().min(0).default(100)
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  /** empty = any origin */
  corsOrigins: string[];
  rateLimitMax: number;
  reportMinDuration: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ValidationError('Invalid environment', toIssues(parsed.error));
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGIN.split(',').map((s) => s.trim()).filter(Boolean),
    rateLimitMax: e.RATE_LIMIT_MAX,
    reportMinDuration: e.REPORT_MIN_DURATION
  };
}
