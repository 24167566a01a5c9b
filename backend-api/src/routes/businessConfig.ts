import { Router } from 'express';

import { businessConfigBodySchema } from '@aircargo/shared';

import { requireAuth } from '../auth/middleware.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { businessConfigPayload, type BusinessConfigService } from '../services/businessConfigService.js';
import { sendDictFailure, sendValidationError } from './dictResponse.js';

// Каждый пользователь видит и меняет только свою конфигурацию.
export function createBusinessConfigRouter(service: BusinessConfigService) {
  const router = Router();
  router.use(asyncHandler(requireAuth));

  router.post(
    '/initialize',
    asyncHandler(async (req, res) => {
      if (!req.user) return res.status(401).json({ ok: false, error: 'missing user' });
      const parsed = businessConfigBodySchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const r = await service.initialize(req.user.id, parsed.data.config_data);
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, item: businessConfigPayload(r.config) });
    }),
  );

  router.get(
    '/current',
    asyncHandler(async (req, res) => {
      if (!req.user) return res.status(401).json({ ok: false, error: 'missing user' });
      const r = await service.getCurrent(req.user.id);
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, item: businessConfigPayload(r.config) });
    }),
  );

  router.put(
    '/current',
    asyncHandler(async (req, res) => {
      if (!req.user) return res.status(401).json({ ok: false, error: 'missing user' });
      const parsed = businessConfigBodySchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const r = await service.updateCurrent(req.user.id, parsed.data.config_data);
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, item: businessConfigPayload(r.config) });
    }),
  );

  return router;
}
