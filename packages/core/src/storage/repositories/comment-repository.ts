import { asc, eq } from 'drizzle-orm';
import { ok, err, type Result } from 'neverthrow';
import type { Comment, UserId } from '../../types/entities.js';
import type { StoreError } from '../../types/errors.js';
import type { BlogQueryable } from '../database.js';
import { comments } from '../schema.js';
import { toStoreError } from './sqlite-errors.js';

export class CommentRepository {
  constructor(private readonly db: BlogQueryable) {}

  create(postId: number, authorId: UserId, content: string): Result<Comment, StoreError> {
    try {
      const row = this.db
        .insert(comments)
        .values({ content, postId, authorId })
        .returning()
        .get();
      if (!row) {
        return err(toStoreError('create comment', new Error('insert returned no row')));
      }
      return ok(row);
    } catch (error: unknown) {
      return err(toStoreError('create comment', error));
    }
  }

  listByPost(postId: number): Result<Comment[], StoreError> {
    try {
      return ok(
        this.db
          .select()
          .from(comments)
          .where(eq(comments.postId, postId))
          .orderBy(asc(comments.id))
          .all(),
      );
    } catch (error: unknown) {
      return err(toStoreError('list comments', error));
    }
  }
}
