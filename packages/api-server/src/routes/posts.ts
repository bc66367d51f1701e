import { Router, type Request, type Response } from 'express';
import {
  createPost,
  listPosts,
  getPost,
  updatePost,
  deletePost,
  createComment,
  listComments,
  NotFoundError,
  POST_NOT_FOUND_MESSAGE,
  type Authenticator,
  type PostInput,
  type SessionFactory,
  type StoreSession,
  type User,
} from '@blog-api/core';
import { withStoreSession } from '../middleware/session.js';
import { currentUser } from '../middleware/auth.js';
import { sendError, sendValidationError } from '../http-errors.js';
import {
  commentRequestSchema,
  parsePathId,
  postListQuerySchema,
  postRequestSchema,
} from '../schemas.js';
import { formatComment, formatPost } from '../serializers.js';

export interface PostsRouteDeps {
  readonly sessions: SessionFactory;
  readonly authenticator: Authenticator;
}

export const POST_DELETED_MESSAGE = 'Post deleted';

/** Parse a post request body; sends the 422 itself and returns undefined on failure. */
function parsePostInput(req: Request, res: Response): PostInput | undefined {
  const parsed = postRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    sendValidationError(res, parsed.error);
    return undefined;
  }
  return {
    title: parsed.data.title,
    content: parsed.data.content,
    categoryId: parsed.data.category_id ?? null,
  };
}

/** The `:postId` segment, or a 404 already sent for anything that is not an id. */
function requirePostId(req: Request, res: Response, route: string): number | undefined {
  const postId = parsePathId(req.params['postId']);
  if (postId === undefined) {
    sendError(res, new NotFoundError('post', POST_NOT_FOUND_MESSAGE), route);
  }
  return postId;
}

/**
 * Posts are private to their author; every route here except comment
 * listing needs a bearer token.
 */
export function createPostsRouter(deps: PostsRouteDeps): Router {
  const router = Router();

  const authenticate = (req: Request, res: Response, session: StoreSession, route: string): User | undefined => {
    const user = currentUser(deps.authenticator, req, session);
    if (user.isErr()) {
      sendError(res, user.error, route);
      return undefined;
    }
    return user.value;
  };

  router.post('/', withStoreSession(deps.sessions, (req, res, session) => {
    const route = 'POST /posts';
    const user = authenticate(req, res, session, route);
    if (!user) return;
    const input = parsePostInput(req, res);
    if (!input) return;

    const created = createPost(session, user, input);
    if (created.isErr()) {
      sendError(res, created.error, route);
      return;
    }
    res.json(formatPost(created.value));
  }));

  router.get('/', withStoreSession(deps.sessions, (req, res, session) => {
    const route = 'GET /posts';
    const user = authenticate(req, res, session, route);
    if (!user) return;

    const query = postListQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendValidationError(res, query.error);
      return;
    }

    const listed = listPosts(session, user, { categoryId: query.data.category_id });
    if (listed.isErr()) {
      sendError(res, listed.error, route);
      return;
    }
    res.json(listed.value.map(formatPost));
  }));

  router.get('/:postId', withStoreSession(deps.sessions, (req, res, session) => {
    const route = 'GET /posts/:postId';
    const user = authenticate(req, res, session, route);
    if (!user) return;
    const postId = requirePostId(req, res, route);
    if (postId === undefined) return;

    const found = getPost(session, user, postId);
    if (found.isErr()) {
      sendError(res, found.error, route);
      return;
    }
    res.json(formatPost(found.value));
  }));

  router.put('/:postId', withStoreSession(deps.sessions, (req, res, session) => {
    const route = 'PUT /posts/:postId';
    const user = authenticate(req, res, session, route);
    if (!user) return;
    const postId = requirePostId(req, res, route);
    if (postId === undefined) return;
    const input = parsePostInput(req, res);
    if (!input) return;

    const updated = updatePost(session, user, postId, input);
    if (updated.isErr()) {
      sendError(res, updated.error, route);
      return;
    }
    res.json(formatPost(updated.value));
  }));

  router.delete('/:postId', withStoreSession(deps.sessions, (req, res, session) => {
    const route = 'DELETE /posts/:postId';
    const user = authenticate(req, res, session, route);
    if (!user) return;
    const postId = requirePostId(req, res, route);
    if (postId === undefined) return;

    const deleted = deletePost(session, user, postId);
    if (deleted.isErr()) {
      sendError(res, deleted.error, route);
      return;
    }
    res.json({ message: POST_DELETED_MESSAGE });
  }));

  // --- Comments ---

  router.post('/:postId/comments', withStoreSession(deps.sessions, (req, res, session) => {
    const route = 'POST /posts/:postId/comments';
    const user = authenticate(req, res, session, route);
    if (!user) return;
    const postId = requirePostId(req, res, route);
    if (postId === undefined) return;

    const parsed = commentRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    const created = createComment(session, user, postId, parsed.data);
    if (created.isErr()) {
      sendError(res, created.error, route);
      return;
    }
    res.json(formatComment(created.value));
  }));

  // No token required.
  router.get('/:postId/comments', withStoreSession(deps.sessions, (req, res, session) => {
    const route = 'GET /posts/:postId/comments';
    const postId = requirePostId(req, res, route);
    if (postId === undefined) return;

    const listed = listComments(session, postId);
    if (listed.isErr()) {
      sendError(res, listed.error, route);
      return;
    }
    res.json(listed.value.map(formatComment));
  }));

  return router;
}
