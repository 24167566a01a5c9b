import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig, requireJwtSecret } from './config.js';
import { db, pool } from './database/db.js';
import { BusinessConfigService } from './services/businessConfigService.js';
import { DictionaryService } from './services/dictionaryService.js';
import { DrizzleBusinessConfigRepository } from './services/drizzleBusinessConfigRepository.js';
import { DrizzleDictionaryRepository } from './services/drizzleDictionaryRepository.js';
import { logError, logInfo } from './utils/logger.js';
import { SnowflakeGenerator } from './utils/snowflake.js';

async function bootstrap() {
  const config = loadConfig();
  requireJwtSecret(config);
  // One generator per process; region/worker must differ between instances sharing a database.
  const ids = new SnowflakeGenerator(config.ids);
  const dictionary = new DictionaryService({ repo: new DrizzleDictionaryRepository(db), ids });
  const businessConfig = new BusinessConfigService({ repo: new DrizzleBusinessConfigRepository(db), ids });
  const app = createApp({ dictionary, businessConfig });

  const server = app.listen(config.port, config.host, () => {
    logInfo(`[backend-api] listening on ${config.host}:${config.port}`, config.ids, { critical: true });
  });

  const shutdown = () => {
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (e: unknown) => {
          logError('[backend-api] pool shutdown failed', { message: String(e) });
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

bootstrap().catch((e: unknown) => {
  logError('[backend-api] startup failed', { message: e instanceof Error ? e.message : String(e) });
  process.exit(1);
});
