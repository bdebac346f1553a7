import { z } from 'zod';

/**
 * Runtime configuration, read from the environment once at startup.
 * `.env` files are loaded by the entry point before this runs.
 */

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  CORS_ORIGIN: z.string().url().default('http://localhost:5173'),
  LOG_LEVEL: logLevelSchema.default('info'),

  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_NAME: z.string().min(1).default('divisions'),
  DB_USER: z.string().min(1).default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  DB_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
  DB_CONNECTION_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
});

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface DatabaseConfig {
  host: string;
  port: number;
  name: string;
  user: string;
  password: string;
  poolMax: number;
  idleTimeoutMs: number;
  connectionTimeoutMs: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  corsOrigin: string;
  logLevel: LogLevel;
  database: DatabaseConfig;
}

/**
 * Parse and validate environment variables.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    logLevel: parsed.LOG_LEVEL,
    database: {
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      name: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      poolMax: parsed.DB_POOL_MAX,
      idleTimeoutMs: parsed.DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMs: parsed.DB_CONNECTION_TIMEOUT_MS,
    },
  };
}
