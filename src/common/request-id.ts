import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

export type RequestWithId = { requestId?: string };

/** Request id (for tracing + debugging). Reuses an incoming `x-request-id`, returned on every response. */
export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = String(req.headers['x-request-id'] ?? '').trim();
    const id = incoming || randomUUID();
    res.setHeader('x-request-id', id);
    const withId: Request & RequestWithId = req;
    withId.requestId = id;
    next();
  };
}
