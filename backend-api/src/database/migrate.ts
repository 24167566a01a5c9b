import { migrate } from 'drizzle-orm/node-postgres/migrator';

import { logError, logInfo } from '../utils/logger.js';
import { db, pool } from './db.js';

async function main() {
  await migrate(db, { migrationsFolder: './drizzle' });
  logInfo('[backend-api] migrations applied', undefined, { critical: true });
  await pool.end();
}

main().catch(async (e) => {
  logError('[backend-api] migration failed', { message: String(e) });
  await pool.end();
  process.exit(1);
});
