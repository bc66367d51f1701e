import { and, asc, eq, type SQL } from 'drizzle-orm';
import { ok, err, type Result } from 'neverthrow';
import type { Post, PostFilter, UserId } from '../../types/entities.js';
import { NotFoundError, type StoreError } from '../../types/errors.js';
import type { BlogQueryable } from '../database.js';
import { posts } from '../schema.js';
import { isForeignKeyViolation, toStoreError } from './sqlite-errors.js';

function categoryNotFound(): NotFoundError {
  return new NotFoundError('category', 'Category not found');
}

export interface PostValues {
  readonly title: string;
  readonly content: string;
  readonly categoryId: number | null;
}

/**
 * Every query except `findById` is scoped to an author. A post owned by
 * someone else is indistinguishable from one that does not exist.
 */
export class PostRepository {
  constructor(private readonly db: BlogQueryable) {}

  /** Unscoped lookup, used to check that a post exists before commenting on it. */
  findById(id: number): Result<Post | null, StoreError> {
    try {
      const row = this.db.select().from(posts).where(eq(posts.id, id)).get();
      return ok(row ?? null);
    } catch (error: unknown) {
      return err(toStoreError('look up post', error));
    }
  }

  findOwned(id: number, authorId: UserId): Result<Post | null, StoreError> {
    try {
      const row = this.db
        .select()
        .from(posts)
        .where(and(eq(posts.id, id), eq(posts.authorId, authorId)))
        .get();
      return ok(row ?? null);
    } catch (error: unknown) {
      return err(toStoreError('look up post', error));
    }
  }

  listOwned(authorId: UserId, filter: PostFilter = {}): Result<Post[], StoreError> {
    const conditions: SQL[] = [eq(posts.authorId, authorId)];
    if (filter.categoryId !== undefined) {
      conditions.push(eq(posts.categoryId, filter.categoryId));
    }

    try {
      return ok(
        this.db
          .select()
          .from(posts)
          .where(and(...conditions))
          .orderBy(asc(posts.id))
          .all(),
      );
    } catch (error: unknown) {
      return err(toStoreError('list posts', error));
    }
  }

  create(authorId: UserId, values: PostValues): Result<Post, NotFoundError | StoreError> {
    try {
      const row = this.db
        .insert(posts)
        .values({
          title: values.title,
          content: values.content,
          authorId,
          categoryId: values.categoryId,
        })
        .returning()
        .get();
      if (!row) {
        return err(toStoreError('create post', new Error('insert returned no row')));
      }
      return ok(row);
    } catch (error: unknown) {
      // author_id always references the current user, so this is the category
      if (isForeignKeyViolation(error)) {
        return err(categoryNotFound());
      }
      return err(toStoreError('create post', error));
    }
  }

  /** Returns null when no post with this id belongs to the author. */
  updateOwned(id: number, authorId: UserId, values: PostValues): Result<Post | null, NotFoundError | StoreError> {
    try {
      const row = this.db
        .update(posts)
        .set({
          title: values.title,
          content: values.content,
          categoryId: values.categoryId,
        })
        .where(and(eq(posts.id, id), eq(posts.authorId, authorId)))
        .returning()
        .get();
      return ok(row ?? null);
    } catch (error: unknown) {
      if (isForeignKeyViolation(error)) {
        return err(categoryNotFound());
      }
      return err(toStoreError('update post', error));
    }
  }

  /** Returns false when no post with this id belongs to the author. */
  deleteOwned(id: number, authorId: UserId): Result<boolean, StoreError> {
    try {
      const result = this.db
        .delete(posts)
        .where(and(eq(posts.id, id), eq(posts.authorId, authorId)))
        .run();
      return ok(result.changes > 0);
    } catch (error: unknown) {
      return err(toStoreError('delete post', error));
    }
  }
}
