/**
 * Anonymous browser session. The id only keys in-memory preferences; it carries no identity.
 * cookie-parser populates req.cookies at runtime; Express Request types don't include cookies by default.
 */
import { createParamDecorator, ExecutionContext, InternalServerErrorException } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

export const SESSION_COOKIE_NAME = 'dg_session';

const SESSION_ID_PATTERN = /^[A-Za-z0-9-]{16,64}$/;

export type RequestWithCookies = { cookies?: Record<string, string | undefined> };

export type RequestWithSession = RequestWithCookies & { sessionId?: string };

export function getSessionCookie(req: RequestWithCookies): string | undefined {
  const raw = req.cookies?.[SESSION_COOKIE_NAME];
  const v = typeof raw === 'string' ? raw.trim() : '';
  return v && SESSION_ID_PATTERN.test(v) ? v : undefined;
}

/**
 * Issues a session cookie on first visit and exposes the id as `req.sessionId`.
 * No `expires`: the browser drops it when the session ends.
 */
export function sessionCookieMiddleware(opts: { secure: boolean }) {
  return (req: Request, res: Response, next: NextFunction) => {
    const sessionReq: Request & RequestWithSession = req;
    let id = getSessionCookie(sessionReq);
    if (!id) {
      id = randomUUID();
      res.cookie(SESSION_COOKIE_NAME, id, { httpOnly: true, secure: opts.secure, sameSite: 'lax', path: '/' });
    }
    sessionReq.sessionId = id;
    next();
  };
}

export const SessionId = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const req = ctx.switchToHttp().getRequest<RequestWithSession>();
  const id = req.sessionId ?? getSessionCookie(req);
  if (!id) throw new InternalServerErrorException('Session middleware is not installed');
  return id;
});
