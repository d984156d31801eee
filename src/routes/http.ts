import type { Request, Response } from 'express';
import { v4 as uuid } from 'uuid';
import { AdvisorError, InvalidArgumentError, errorCode, errorMessage, httpStatusFor } from '../errors.js';

export const SESSION_COOKIE = 'sessionId';

export function sessionIdFor(req: Request, res: Response): string {
  const existing: unknown = req.cookies?.[SESSION_COOKIE];
  if (typeof existing === 'string' && existing) return existing;
  const sessionId = uuid();
  res.cookie(SESSION_COOKIE, sessionId, { httpOnly: true });
  return sessionId;
}

export function sendError(res: Response, error: unknown, tag: string) {
  const status = httpStatusFor(error);
  if (status >= 500) {
    console.error(`[${tag}] error:`, error);
    res.status(status).json({ error: 'Internal Server Error', code: errorCode(error) });
    return;
  }
  res.status(status).json({ error: errorMessage(error), code: errorCode(error), details: errorMessage(error) });
}

// Client errors raised by middleware (a malformed JSON body from express.json()) become InvalidArgument.
export function fromMiddlewareError(err: unknown): unknown {
  if (err instanceof AdvisorError) return err;
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return new InvalidArgumentError(err.message);
  }
  return err;
}
