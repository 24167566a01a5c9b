import { Router } from 'express';

import {
  dictLabelSchema,
  dictOptionCreateSchema,
  dictOptionQuerySchema,
  dictOptionUpdateSchema,
  dictTypeKeySchema,
  statusToEnabled,
} from '@aircargo/shared';
import { z } from 'zod';

import { requireAdmin, requireAuth } from '../auth/middleware.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { dictOptionGroupPayload, type DictionaryService } from '../services/dictionaryService.js';
import { parseGroupId, sendBadId, sendDictFailure, sendValidationError } from './dictResponse.js';

const byLabelQuerySchema = z.object({ dict_type: dictTypeKeySchema, label: dictLabelSchema });

export function createDictOptionsRouter(service: DictionaryService) {
  const router = Router();
  router.use(asyncHandler(requireAuth));

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const parsed = dictOptionQuerySchema.safeParse(req.query);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const q = parsed.data;
      const r = await service.listGroups({
        page: q.page,
        pageSize: q.page_size,
        dictType: q.dict_type,
        enabled: q.status === undefined ? undefined : statusToEnabled(q.status),
      });
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, total: r.total, items: r.items.map(dictOptionGroupPayload) });
    }),
  );

  router.get(
    '/:groupId',
    asyncHandler(async (req, res) => {
      const groupId = parseGroupId(req.params.groupId);
      if (groupId === null) return sendBadId(res);
      const r = await service.getGroup(groupId);
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, item: dictOptionGroupPayload(r.group) });
    }),
  );

  router.post(
    '/',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const parsed = dictOptionCreateSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const d = parsed.data;
      const r = await service.createGroup({
        dictType: d.dict_type,
        label: d.label,
        values: d.value,
        enabled: statusToEnabled(d.status),
      });
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, item: dictOptionGroupPayload(r.group) });
    }),
  );

  // upsert by (dict_type, label)
  router.put(
    '/',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const parsed = dictOptionCreateSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const d = parsed.data;
      const r = await service.upsertGroup({
        dictType: d.dict_type,
        label: d.label,
        values: d.value,
        enabled: statusToEnabled(d.status),
      });
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, created: r.created, item: dictOptionGroupPayload(r.group) });
    }),
  );

  router.patch(
    '/:groupId',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const groupId = parseGroupId(req.params.groupId);
      if (groupId === null) return sendBadId(res);
      const parsed = dictOptionUpdateSchema.safeParse(req.body);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const d = parsed.data;
      const r = await service.updateGroupById(groupId, {
        label: d.label,
        values: d.value,
        enabled: d.status === undefined ? undefined : statusToEnabled(d.status),
      });
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, item: dictOptionGroupPayload(r.group) });
    }),
  );

  // must be registered before '/:groupId'
  router.delete(
    '/by-label',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const parsed = byLabelQuerySchema.safeParse(req.query);
      if (!parsed.success) return sendValidationError(res, parsed.error);
      const r = await service.deleteGroupByTypeLabel(parsed.data.dict_type, parsed.data.label);
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, deletedOptions: r.deletedOptions });
    }),
  );

  router.delete(
    '/:groupId',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const groupId = parseGroupId(req.params.groupId);
      if (groupId === null) return sendBadId(res);
      const r = await service.deleteGroup(groupId);
      if (!r.ok) return sendDictFailure(res, r);
      return res.json({ ok: true, deletedOptions: r.deletedOptions });
    }),
  );

  return router;
}
