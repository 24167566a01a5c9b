import { Router } from 'express';

import { dictTypeCreateSchema, dictTypeQuerySchema, dictTypeUpdateSchema, statusToEnabled } from '@aircargo/shared';

import { requireAdmin, requireAuth } from '../auth/middleware.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { dictTypePayload, type DictionaryService } from '../services/dictionaryService.js';
import { sendDictFailure, sendValidationError } from './dictResponse.js';

export function createDictTypesRouter(service: DictionaryService) {
  const router = Router();
  router.use(asyncHandler(requireAuth));

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const parsed = dictTypeQuerySchema.safeParse(req.query);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const q = parsed.data;
      const r = await service.listTypes({
        page: q.page,
        pageSize: q.page_size,
        type: q.type,
        enabled: q.status === undefined ? undefined : statusToEnabled(q.status),
      });
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, total: r.total, items: r.items.map(dictTypePayload) });
    }),
  );

  router.get(
    '/:type',
    asyncHandler(async (req, res) => {
      const r = await service.getType(String(req.params.type ?? ''));
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, item: dictTypePayload(r.dictType) });
    }),
  );

  // strict create: an existing type key is a conflict
  router.post(
    '/',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const parsed = dictTypeCreateSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const d = parsed.data;
      const r = await service.createType({ name: d.name, type: d.type, enabled: statusToEnabled(d.status) });
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, item: dictTypePayload(r.dictType) });
    }),
  );

  router.put(
    '/',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const parsed = dictTypeCreateSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const d = parsed.data;
      const r = await service.createOrUpdateType({ name: d.name, type: d.type, enabled: statusToEnabled(d.status) });
      return res.json({ ok: true, created: r.created, item: dictTypePayload(r.dictType) });
    }),
  );

  router.patch(
    '/:type',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const parsed = dictTypeUpdateSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const d = parsed.data;
      const r = await service.updateType(String(req.params.type ?? ''), {
        name: d.name,
        newType: d.type,
        enabled: d.status === undefined ? undefined : statusToEnabled(d.status),
      });
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, item: dictTypePayload(r.dictType) });
    }),
  );

  router.delete(
    '/:type',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const r = await service.deleteType(String(req.params.type ?? ''));
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, deletedOptions: r.deletedOptions });
    }),
  );

  return router;
}
