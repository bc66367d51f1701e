import { eq } from 'drizzle-orm';
import { ok, err, type Result } from 'neverthrow';
import type { UserId, UserRecord } from '../../types/entities.js';
import { DuplicateResourceError, type StoreError } from '../../types/errors.js';
import type { BlogQueryable } from '../database.js';
import { users } from '../schema.js';
import { isUniqueViolation, toStoreError } from './sqlite-errors.js';

type UserRow = typeof users.$inferSelect;

function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.hashedPassword,
  };
}

export class UserRepository {
  constructor(private readonly db: BlogQueryable) {}

  /** Exact, case-sensitive match. */
  findByUsername(username: string): Result<UserRecord | null, StoreError> {
    try {
      const row = this.db.select().from(users).where(eq(users.username, username)).get();
      return ok(row ? toUserRecord(row) : null);
    } catch (error: unknown) {
      return err(toStoreError('look up user', error));
    }
  }

  findById(id: UserId): Result<UserRecord | null, StoreError> {
    try {
      const row = this.db.select().from(users).where(eq(users.id, id)).get();
      return ok(row ? toUserRecord(row) : null);
    } catch (error: unknown) {
      return err(toStoreError('look up user', error));
    }
  }

  create(username: string, passwordHash: string): Result<UserRecord, DuplicateResourceError | StoreError> {
    try {
      const row = this.db
        .insert(users)
        .values({ username, hashedPassword: passwordHash })
        .returning()
        .get();
      if (!row) {
        return err(toStoreError('create user', new Error('insert returned no row')));
      }
      return ok(toUserRecord(row));
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        return err(new DuplicateResourceError('user', 'Username already registered'));
      }
      return err(toStoreError('create user', error));
    }
  }
}
