import { asc, eq } from 'drizzle-orm';
import { ok, err, type Result } from 'neverthrow';
import type { Category } from '../../types/entities.js';
import { DuplicateResourceError, type StoreError } from '../../types/errors.js';
import type { BlogQueryable } from '../database.js';
import { categories } from '../schema.js';
import { isUniqueViolation, toStoreError } from './sqlite-errors.js';

export class CategoryRepository {
  constructor(private readonly db: BlogQueryable) {}

  findById(id: number): Result<Category | null, StoreError> {
    try {
      const row = this.db.select().from(categories).where(eq(categories.id, id)).get();
      return ok(row ?? null);
    } catch (error: unknown) {
      return err(toStoreError('look up category', error));
    }
  }

  findByName(name: string): Result<Category | null, StoreError> {
    try {
      const row = this.db.select().from(categories).where(eq(categories.name, name)).get();
      return ok(row ?? null);
    } catch (error: unknown) {
      return err(toStoreError('look up category', error));
    }
  }

  list(): Result<Category[], StoreError> {
    try {
      return ok(this.db.select().from(categories).orderBy(asc(categories.id)).all());
    } catch (error: unknown) {
      return err(toStoreError('list categories', error));
    }
  }

  create(name: string): Result<Category, DuplicateResourceError | StoreError> {
    try {
      const row = this.db.insert(categories).values({ name }).returning().get();
      if (!row) {
        return err(toStoreError('create category', new Error('insert returned no row')));
      }
      return ok(row);
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        return err(new DuplicateResourceError('category', 'Category already exists'));
      }
      return err(toStoreError('create category', error));
    }
  }
}
