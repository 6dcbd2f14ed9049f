/**
 * Centralized configuration for the analytics service.
 *
 * Environment variables are loaded from `.env` (if present) and validated once
 * on first access.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// =============================================================================
// ENVIRONMENT SCHEMA
// =============================================================================

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  SERVICE_NAME: z.string().default('analytics-service'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),

  // Database
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_NAME: z.string().min(1).default('ticketing'),
  DB_USER: z.string().min(1).default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),

  // Analytics defaults
  ANALYTICS_TOP_SELLING_LIMIT: z.coerce.number().int().min(0).default(5),
  ANALYTICS_LOW_CAPACITY_THRESHOLD: z.coerce.number().min(0).max(100).default(10),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  pool: {
    min: number;
    max: number;
  };
}

export interface ServiceConfig {
  env: EnvConfig['NODE_ENV'];
  serviceName: string;
  logLevel: string;
  database: DatabaseConfig;
  analytics: {
    topSellingLimit: number;
    lowCapacityThreshold: number;
  };
}

// =============================================================================
// VALIDATION
// =============================================================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    console.error('Configuration validation failed:');
    issues.forEach((issue) => console.error(`  - ${issue}`));
    throw new Error(`Invalid configuration (${issues.join('; ')})`);
  }

  const parsed = result.data;

  return {
    env: parsed.NODE_ENV,
    serviceName: parsed.SERVICE_NAME,
    logLevel: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === 'production' ? 'info' : 'debug'),
    database: {
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      database: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      pool: {
        min: parsed.DB_POOL_MIN,
        max: parsed.DB_POOL_MAX,
      },
    },
    analytics: {
      topSellingLimit: parsed.ANALYTICS_TOP_SELLING_LIMIT,
      lowCapacityThreshold: parsed.ANALYTICS_LOW_CAPACITY_THRESHOLD,
    },
  };
}

export const config = loadConfig();
