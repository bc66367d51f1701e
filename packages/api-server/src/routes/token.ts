import { Router } from 'express';
import type { Authenticator, SessionFactory } from '@blog-api/core';
import { withStoreSession } from '../middleware/session.js';
import { sendError, sendValidationError } from '../http-errors.js';
import { credentialsSchema } from '../schemas.js';

export interface TokenRouteDeps {
  readonly sessions: SessionFactory;
  readonly authenticator: Authenticator;
}

/** Credential exchange. Accepts an urlencoded login form or a JSON body. */
export function createTokenRouter(deps: TokenRouteDeps): Router {
  const router = Router();

  router.post('/', withStoreSession(deps.sessions, async (req, res, session) => {
    const parsed = credentialsSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    const { username, password } = parsed.data;
    const login = await deps.authenticator.login(session, username, password);
    if (login.isErr()) {
      sendError(res, login.error, 'POST /token');
      return;
    }

    res.json(login.value);
  }));

  return router;
}
