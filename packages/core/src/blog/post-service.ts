import { ok, err, type Result } from 'neverthrow';
import type { Post, PostFilter, PostInput, User } from '../types/entities.js';
import { NotFoundError, type StoreError } from '../types/errors.js';
import type { StoreSession } from '../storage/session.js';
import type { BlogRepositories, PostValues } from '../storage/repositories/index.js';

export const POST_NOT_FOUND_MESSAGE = 'Post not found';
export const CATEGORY_NOT_FOUND_MESSAGE = 'Category not found';

function postNotFound(): NotFoundError {
  return new NotFoundError('post', POST_NOT_FOUND_MESSAGE);
}

function toValues(input: PostInput): PostValues {
  return {
    title: input.title,
    content: input.content,
    categoryId: input.categoryId ?? null,
  };
}

function checkCategory(repos: BlogRepositories, categoryId: number | null): Result<void, NotFoundError | StoreError> {
  if (categoryId === null) {
    return ok(undefined);
  }
  const found = repos.categories.findById(categoryId);
  if (found.isErr()) {
    return err(found.error);
  }
  if (!found.value) {
    return err(new NotFoundError('category', CATEGORY_NOT_FOUND_MESSAGE));
  }
  return ok(undefined);
}

export function createPost(
  session: StoreSession,
  author: User,
  input: PostInput,
): Result<Post, NotFoundError | StoreError> {
  const values = toValues(input);
  return session.transaction((repos) =>
    checkCategory(repos, values.categoryId).andThen(() => repos.posts.create(author.id, values)),
  );
}

/** Only the author's own posts, optionally narrowed to one category. */
export function listPosts(
  session: StoreSession,
  author: User,
  filter: PostFilter = {},
): Result<Post[], StoreError> {
  return session.repositories.posts.listOwned(author.id, filter);
}

export function getPost(
  session: StoreSession,
  author: User,
  postId: number,
): Result<Post, NotFoundError | StoreError> {
  return session.repositories.posts
    .findOwned(postId, author.id)
    .andThen((post) => (post ? ok(post) : err(postNotFound())));
}

/**
 * Full replacement of title, content and category. Someone else's post is
 * reported exactly like a missing one.
 */
export function updatePost(
  session: StoreSession,
  author: User,
  postId: number,
  input: PostInput,
): Result<Post, NotFoundError | StoreError> {
  const values = toValues(input);
  return session.transaction((repos) =>
    repos.posts
      .findOwned(postId, author.id)
      .andThen((post) => (post ? ok(post) : err(postNotFound())))
      .andThen(() => checkCategory(repos, values.categoryId))
      .andThen(() => repos.posts.updateOwned(postId, author.id, values))
      .andThen((post) => (post ? ok(post) : err(postNotFound()))),
  );
}

export function deletePost(
  session: StoreSession,
  author: User,
  postId: number,
): Result<void, NotFoundError | StoreError> {
  return session.transaction((repos) =>
    repos.posts
      .deleteOwned(postId, author.id)
      .andThen((deleted) => (deleted ? ok(undefined) : err(postNotFound()))),
  );
}
