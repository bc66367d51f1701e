import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createCategory, listCategories } from './category-service.js';
import { createMemoryFactory } from './test-helpers.js';
import type { SessionFactory, StoreSession } from '../storage/session.js';
import { DuplicateResourceError } from '../types/errors.js';

describe('category service', () => {
  let factory: SessionFactory;
  let session: StoreSession;

  beforeEach(() => {
    factory = createMemoryFactory();
    session = factory.acquire();
  });

  afterEach(() => {
    session.release();
    factory.close();
  });

  it('should create a category', () => {
    const result = createCategory(session, 'tech');

    expect(result.isOk() && result.value).toEqual({ id: 1, name: 'tech' });
  });

  it('should let the first writer of a name win', () => {
    createCategory(session, 'tech');

    const second = createCategory(session, 'tech');

    expect(second.isErr()).toBe(true);
    if (second.isErr()) {
      expect(second.error).toBeInstanceOf(DuplicateResourceError);
      expect(second.error.message).toBe('Category already exists');
    }
    const listed = listCategories(session);
    expect(listed.isOk() && listed.value).toEqual([{ id: 1, name: 'tech' }]);
  });

  it('should list an empty store as an empty array', () => {
    const listed = listCategories(session);

    expect(listed.isOk() && listed.value).toEqual([]);
  });
});
