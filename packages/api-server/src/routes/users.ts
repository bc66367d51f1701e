import { Router } from 'express';
import type { Authenticator, SessionFactory } from '@blog-api/core';
import { withStoreSession } from '../middleware/session.js';
import { sendError, sendValidationError } from '../http-errors.js';
import { credentialsSchema } from '../schemas.js';
import { formatUser } from '../serializers.js';

export interface UsersRouteDeps {
  readonly sessions: SessionFactory;
  readonly authenticator: Authenticator;
}

export function createUsersRouter(deps: UsersRouteDeps): Router {
  const router = Router();

  router.post('/', withStoreSession(deps.sessions, async (req, res, session) => {
    const parsed = credentialsSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    const registered = await deps.authenticator.register(session, parsed.data);
    if (registered.isErr()) {
      sendError(res, registered.error, 'POST /users');
      return;
    }

    res.json(formatUser(registered.value));
  }));

  return router;
}
