import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { ClockRegressionError, PersistenceError } from '../errors.js';
import { logError } from '../utils/logger.js';

// Express 4 does not catch rejected promises from async handlers.
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  // Body parser invalid JSON
  if (isBodyParseError(err)) {
    return res.status(400).json({ ok: false, error: 'invalid json' });
  }

  const msg = err instanceof Error ? err.message : String(err);
  const kind = err instanceof ClockRegressionError ? 'clock_regression' : err instanceof PersistenceError ? 'persistence' : 'unhandled';
  logError(`${kind} error`, {
    method: req.method,
    url: req.originalUrl || req.url,
    message: msg,
    ...(err instanceof PersistenceError && err.cause instanceof Error ? { cause: err.cause.message } : {}),
  });
  return res.status(500).json({ ok: false, error: msg });
}
