import express from 'express';
import cors from 'cors';

import { healthRouter } from './routes/health.js';
import { createDictTypesRouter } from './routes/dictTypes.js';
import { createDictOptionsRouter } from './routes/dictOptions.js';
import { createBusinessConfigRouter } from './routes/businessConfig.js';
import type { BusinessConfigService } from './services/businessConfigService.js';
import type { DictionaryService } from './services/dictionaryService.js';
import { errorHandler } from './middleware/errorHandler.js';

export type AppDeps = {
  dictionary: DictionaryService;
  businessConfig: BusinessConfigService;
};

export function createApp(deps: AppDeps) {
  const app = express();
  // За reverse-proxy важно корректно понимать X-Forwarded-* заголовки.
  app.set('trust proxy', true);
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  app.use('/health', healthRouter);
  app.use('/dict-types', createDictTypesRouter(deps.dictionary));
  app.use('/dict-options', createDictOptionsRouter(deps.dictionary));
  app.use('/config', createBusinessConfigRouter(deps.businessConfig));

  // Must be last: centralized error handler.
  app.use(errorHandler);
  return app;
}
