import { err, type Result } from 'neverthrow';
import type { Category } from '../types/entities.js';
import { DuplicateResourceError, type StoreError } from '../types/errors.js';
import type { StoreSession } from '../storage/session.js';

export const DUPLICATE_CATEGORY_MESSAGE = 'Category already exists';

/**
 * Categories are global. The first writer of a name wins; the unique
 * constraint catches a writer that slips in between the check and the insert.
 */
export function createCategory(
  session: StoreSession,
  name: string,
): Result<Category, DuplicateResourceError | StoreError> {
  const existing = session.repositories.categories.findByName(name);
  if (existing.isErr()) {
    return err(existing.error);
  }
  if (existing.value) {
    return err(new DuplicateResourceError('category', DUPLICATE_CATEGORY_MESSAGE));
  }
  return session.transaction((repos) => repos.categories.create(name));
}

export function listCategories(session: StoreSession): Result<Category[], StoreError> {
  return session.repositories.categories.list();
}
