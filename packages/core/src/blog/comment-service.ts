import { ok, err, type Result } from 'neverthrow';
import type { Comment, CommentInput, User } from '../types/entities.js';
import { NotFoundError, type StoreError } from '../types/errors.js';
import type { StoreSession } from '../storage/session.js';
import type { BlogRepositories } from '../storage/repositories/index.js';
import { POST_NOT_FOUND_MESSAGE } from './post-service.js';

function requirePost(repos: BlogRepositories, postId: number): Result<void, NotFoundError | StoreError> {
  return repos.posts
    .findById(postId)
    .andThen((post) => (post ? ok(undefined) : err(new NotFoundError('post', POST_NOT_FOUND_MESSAGE))));
}

/** Any authenticated user may comment on any existing post. */
export function createComment(
  session: StoreSession,
  author: User,
  postId: number,
  input: CommentInput,
): Result<Comment, NotFoundError | StoreError> {
  return session.transaction((repos) =>
    requirePost(repos, postId).andThen(() => repos.comments.create(postId, author.id, input.content)),
  );
}

/** Needs no identity: every comment of an existing post, oldest first. */
export function listComments(session: StoreSession, postId: number): Result<Comment[], NotFoundError | StoreError> {
  const repos = session.repositories;
  return requirePost(repos, postId).andThen(() => repos.comments.listByPost(postId));
}
