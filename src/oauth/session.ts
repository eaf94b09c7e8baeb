/**
 * Session Middleware
 *
 * Maps the signed `gw.sid` cookie to a session id and exposes it as
 * `req.sessionId`. The credential core only ever sees that id; cookie
 * transport stays here. Requires cookie-parser to run first with the same
 * secret.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { nanoid } from 'nanoid';

declare global {
  namespace Express {
    interface Request {
      /** Set by sessionMiddleware */
      sessionId?: string;
    }
  }
}

export const SESSION_COOKIE = 'gw.sid';

const SESSION_ID_LENGTH = 32;
const SESSION_MAX_AGE_MS = 30 * 24 * 60 * 60 * 1000; // 30 days

export interface SessionOptions {
  secure: boolean;
  generateId?: () => string;
}

export function sessionMiddleware(options: SessionOptions): RequestHandler {
  const generateId = options.generateId ?? (() => nanoid(SESSION_ID_LENGTH));

  return (req: Request, res: Response, next: NextFunction): void => {
    // cookie-parser yields false for a cookie whose signature does not verify
    const signed: unknown = req.signedCookies?.[SESSION_COOKIE];

    if (typeof signed === 'string' && signed.length > 0) {
      req.sessionId = signed;
    } else {
      req.sessionId = generateId();
      res.cookie(SESSION_COOKIE, req.sessionId, {
        signed: true,
        httpOnly: true,
        sameSite: 'lax',
        secure: options.secure,
        maxAge: SESSION_MAX_AGE_MS,
      });
    }

    next();
  };
}

/**
 * Session id of a request that went through sessionMiddleware
 */
export function requireSessionId(req: Request): string {
  if (!req.sessionId) {
    throw new Error('sessionMiddleware must run before this handler');
  }
  return req.sessionId;
}
