import type { NextFunction, Request, Response } from 'express';

import type { AuthUser } from './jwt.js';
import { verifyAccessToken } from './jwt.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

function extractBearerToken(req: Request): string | null {
  const raw = req.header('authorization') ?? '';
  const m = raw.match(/^Bearer\s+(.+)$/i);
  const token = m?.[1];
  return token ? token.trim() : null;
}

export async function requireAuth(req: Request, res: Response, next: NextFunction) {
  const token = extractBearerToken(req);
  if (!token) return res.status(401).json({ ok: false, error: 'missing bearer token' });
  let user: AuthUser;
  try {
    user = await verifyAccessToken(token);
  } catch {
    return res.status(401).json({ ok: false, error: 'invalid token' });
  }
  req.user = user;
  return next();
}

export function isAdminRole(role: string) {
  const r = String(role || '').toLowerCase();
  return r === 'admin' || r === 'superadmin';
}

export function requireAdmin(req: Request, res: Response, next: NextFunction) {
  if (!req.user?.id) return res.status(401).json({ ok: false, error: 'missing user' });
  if (!isAdminRole(req.user.role)) return res.status(403).json({ ok: false, error: 'admin only' });
  return next();
}
