import 'dotenv/config';
import pg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';

import { loadConfig } from '../config.js';

const { Pool } = pg;

const { db: dbConfig } = loadConfig();

export const pool = new Pool({
  host: dbConfig.host,
  port: dbConfig.port,
  database: dbConfig.database,
  user: dbConfig.user,
  password: dbConfig.password,
  ssl: dbConfig.ssl ? { rejectUnauthorized: false } : undefined,
  // Pool tuning (important for concurrency and avoiding connection storms)
  max: dbConfig.poolMax,
  idleTimeoutMillis: dbConfig.idleTimeoutMillis,
  connectionTimeoutMillis: dbConfig.connectionTimeoutMillis,
});

export const db = drizzle(pool);

export type Db = typeof db;
