import { z } from 'zod';

const databaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_IDLE_TIMEOUT: z.coerce.number().int().nonnegative().default(20),
  DB_CONNECT_TIMEOUT: z.coerce.number().int().positive().default(10),
});

export interface DatabaseConfig {
  url: string;
  poolMax: number;
  idleTimeout: number;
  connectTimeout: number;
}

/**
 * Read connection settings from the environment.
 * Pool and timeout values fall back to the defaults used in production.
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  if (!env.DATABASE_URL) {
    throw new Error(
      'DATABASE_URL environment variable is not set. Please add it to your .env.local file.'
    );
  }

  const parsed = databaseConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid database configuration: ${problems}`);
  }

  return {
    url: parsed.data.DATABASE_URL,
    poolMax: parsed.data.DB_POOL_MAX,
    idleTimeout: parsed.data.DB_IDLE_TIMEOUT,
    connectTimeout: parsed.data.DB_CONNECT_TIMEOUT,
  };
}
