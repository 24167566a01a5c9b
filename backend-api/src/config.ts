import { z } from 'zod';

import { InvalidConfigError } from './errors.js';
import { MAX_REGION_ID, MAX_WORKER_ID } from './utils/snowflake.js';

const boolFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  HOST: z.string().min(1).default('127.0.0.1'),

  PGHOST: z.string().min(1).default('localhost'),
  PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PGDATABASE: z.string().min(1).default('aircargo'),
  PGUSER: z.string().min(1).default('postgres'),
  PGPASSWORD: z.string().default('postgres'),
  PGSSL: boolFlag,
  PGPOOL_MAX: z.coerce.number().int().min(1).default(10),
  PGPOOL_IDLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
  PGPOOL_CONN_TIMEOUT_MS: z.coerce.number().int().min(0).default(5_000),

  AIRCARGO_REGION_ID: z.coerce.number().int().min(0).max(MAX_REGION_ID).default(1),
  AIRCARGO_WORKER_ID: z.coerce.number().int().min(0).max(MAX_WORKER_ID).default(1),
  // Only the HTTP server needs it; scripts that touch the database do not.
  AIRCARGO_JWT_SECRET: z.string().trim().min(32, 'AIRCARGO_JWT_SECRET must be 32+ chars').optional(),
});

export type AppConfig = {
  port: number;
  host: string;
  db: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    ssl: boolean;
    poolMax: number;
    idleTimeoutMillis: number;
    connectionTimeoutMillis: number;
  };
  ids: { regionId: number; workerId: number };
  jwtSecret: string | null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new InvalidConfigError(`invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    db: {
      host: e.PGHOST,
      port: e.PGPORT,
      database: e.PGDATABASE,
      user: e.PGUSER,
      password: e.PGPASSWORD,
      ssl: e.PGSSL,
      poolMax: e.PGPOOL_MAX,
      idleTimeoutMillis: e.PGPOOL_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: e.PGPOOL_CONN_TIMEOUT_MS,
    },
    ids: { regionId: e.AIRCARGO_REGION_ID, workerId: e.AIRCARGO_WORKER_ID },
    jwtSecret: e.AIRCARGO_JWT_SECRET ?? null,
  };
}

export function requireJwtSecret(config: AppConfig): string {
  if (!config.jwtSecret) throw new InvalidConfigError('AIRCARGO_JWT_SECRET is not configured (must be 32+ chars)');
  return config.jwtSecret;
}
