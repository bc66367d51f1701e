import { openDatabase, ensureSchema, MEMORY_DATABASE } from '../storage/database.js';
import { SessionFactory } from '../storage/session.js';
import type { StoreSession } from '../storage/session.js';
import type { User } from '../types/entities.js';

/** Fresh in-memory store with the schema in place. */
export function createMemoryFactory(): SessionFactory {
  const opened = openDatabase(MEMORY_DATABASE);
  if (opened.isErr()) throw opened.error;
  const schemaResult = ensureSchema(opened.value);
  if (schemaResult.isErr()) throw schemaResult.error;
  return new SessionFactory(opened.value);
}

export function seedUser(session: StoreSession, username: string): User {
  const created = session.repositories.users.create(username, `hash-of-${username}`);
  if (created.isErr()) throw created.error;
  return { id: created.value.id, username: created.value.username };
}
