import { Router } from 'express';
import { createCategory, listCategories, type Authenticator, type SessionFactory } from '@blog-api/core';
import { withStoreSession } from '../middleware/session.js';
import { currentUser } from '../middleware/auth.js';
import { sendError, sendValidationError } from '../http-errors.js';
import { categoryRequestSchema } from '../schemas.js';
import { formatCategory } from '../serializers.js';

export interface CategoriesRouteDeps {
  readonly sessions: SessionFactory;
  readonly authenticator: Authenticator;
}

export function createCategoriesRouter(deps: CategoriesRouteDeps): Router {
  const router = Router();

  router.post('/', withStoreSession(deps.sessions, (req, res, session) => {
    const user = currentUser(deps.authenticator, req, session);
    if (user.isErr()) {
      sendError(res, user.error, 'POST /categories');
      return;
    }

    const parsed = categoryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    const created = createCategory(session, parsed.data.name);
    if (created.isErr()) {
      sendError(res, created.error, 'POST /categories');
      return;
    }
    res.json(formatCategory(created.value));
  }));

  router.get('/', withStoreSession(deps.sessions, (_req, res, session) => {
    const listed = listCategories(session);
    if (listed.isErr()) {
      sendError(res, listed.error, 'GET /categories');
      return;
    }
    res.json(listed.value.map(formatCategory));
  }));

  return router;
}
