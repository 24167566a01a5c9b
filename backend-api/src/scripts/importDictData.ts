import 'dotenv/config';
import { readFile } from 'node:fs/promises';

import { dictImportFileSchema } from '@aircargo/shared';

import { loadConfig } from '../config.js';
import { db, pool } from '../database/db.js';
import { DictionaryService } from '../services/dictionaryService.js';
import { DrizzleDictionaryRepository } from '../services/drizzleDictionaryRepository.js';
import { logError, logInfo } from '../utils/logger.js';
import { SnowflakeGenerator } from '../utils/snowflake.js';
import { resolveImportArgs } from './cliArgs.js';

const usage = 'Usage: npm run dict:import -w backend-api -- <file.json> [--no-update] [--clear-options]  (see data/freight_code.example.json)';

async function main() {
  const args = resolveImportArgs(process.argv.slice(2));
  if (!args.file) {
    console.error(usage);
    process.exitCode = 2;
    return;
  }

  const raw = await readFile(args.file, 'utf8');
  const parsed = dictImportFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    logError('dictionary file is invalid', { file: args.file, issues: parsed.error.flatten() });
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const service = new DictionaryService({
    repo: new DrizzleDictionaryRepository(db),
    ids: new SnowflakeGenerator(config.ids),
  });
  const r = await service.importDictionary(parsed.data, { updateIfExists: args.updateIfExists, clearOptions: args.clearOptions });
  logInfo(
    `imported ${r.dictType.type}`,
    {
      typeCreated: r.typeCreated,
      created: r.created,
      updated: r.updated,
      skipped: r.skipped,
      cleared: r.cleared,
    },
    { critical: true },
  );
}

main()
  .catch((e: unknown) => {
    logError('dictionary import failed', { message: e instanceof Error ? e.message : String(e) });
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
