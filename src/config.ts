import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  // Optional: pg falls back to the PG* variables when no connection string is given
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  API_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  LOGIN_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface RateLimitSettings {
  apiPerMinute: number;
  loginPerMinute: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  logLevel: LogLevel;
  db: {
    connectionString?: string;
    poolMax: number;
  };
  rateLimits: RateLimitSettings;
}

/**
 * Read and validate configuration from the environment.
 * Throws with every offending variable named when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    db: {
      connectionString: vars.DATABASE_URL,
      poolMax: vars.DB_POOL_MAX,
    },
    rateLimits: {
      apiPerMinute: vars.API_RATE_LIMIT_PER_MINUTE,
      loginPerMinute: vars.LOGIN_RATE_LIMIT_PER_MINUTE,
    },
  };
}

export const config = loadConfig();
