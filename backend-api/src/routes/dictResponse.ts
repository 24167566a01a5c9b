import type { Response } from 'express';
import type { ZodError } from 'zod';

import { DictErrorCode, type DictFailure } from '@aircargo/shared';

const statusByCode: Record<DictErrorCode, number> = {
  [DictErrorCode.NotFound]: 404,
  [DictErrorCode.Conflict]: 409,
  [DictErrorCode.InvalidArgument]: 400,
};

export function sendDictFailure(res: Response, failure: DictFailure) {
  return res.status(statusByCode[failure.code]).json({ ok: false, code: failure.code, error: failure.error });
}

export function sendValidationError(res: Response, error: ZodError) {
  return res.status(400).json({ ok: false, code: DictErrorCode.InvalidArgument, error: error.flatten() });
}

export function sendBadId(res: Response) {
  return sendDictFailure(res, { ok: false, code: DictErrorCode.InvalidArgument, error: 'bad id' });
}

const MAX_ID = (1n << 63n) - 1n;

export function parseGroupId(raw: string | undefined): bigint | null {
  const s = String(raw ?? '').trim();
  if (!/^\d{1,19}$/.test(s)) return null;
  const id = BigInt(s);
  return id <= MAX_ID ? id : null;
}
