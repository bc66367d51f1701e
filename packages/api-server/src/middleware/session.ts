import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { SessionFactory, StoreSession } from '@blog-api/core';

export type SessionHandler = (req: Request, res: Response, session: StoreSession) => Promise<void> | void;

/**
 * Give `handler` a store session for the lifetime of the request. The
 * session is released however the handler exits; a thrown error goes to
 * Express's error handler.
 */
export function withStoreSession(sessions: SessionFactory, handler: SessionHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    sessions.withSession((session) => handler(req, res, session)).catch(next);
  };
}
