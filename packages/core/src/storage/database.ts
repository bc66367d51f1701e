import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { fileURLToPath } from 'node:url';
import { ok, err, type Result } from 'neverthrow';
import { StoreError } from '../types/errors.js';
import * as schema from './schema.js';

export type BlogSchema = typeof schema;

/** Anything queries can run against: the database itself or an open transaction. */
export type BlogQueryable = BaseSQLiteDatabase<'sync', Database.RunResult, BlogSchema>;

export interface BlogDatabase {
  /** Resolved SQLite filename (or `:memory:`). */
  readonly filename: string;
  readonly orm: BetterSQLite3Database<BlogSchema>;
  readonly connection: Database.Database;
  close(): void;
}

export const MEMORY_DATABASE = ':memory:';

const URL_SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

// Order matters: children before parents.
const DROP_STATEMENTS = [
  'DROP TABLE IF EXISTS comments',
  'DROP TABLE IF EXISTS posts',
  'DROP TABLE IF EXISTS categories',
  'DROP TABLE IF EXISTS users',
];

const CREATE_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    hashed_password TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE
  )`,
  `CREATE TABLE IF NOT EXISTS posts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    author_id INTEGER NOT NULL REFERENCES users(id),
    category_id INTEGER REFERENCES categories(id)
  )`,
  'CREATE INDEX IF NOT EXISTS posts_author_id_idx ON posts(author_id)',
  `CREATE TABLE IF NOT EXISTS comments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    content TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    post_id INTEGER NOT NULL REFERENCES posts(id) ON DELETE CASCADE,
    author_id INTEGER NOT NULL REFERENCES users(id)
  )`,
  'CREATE INDEX IF NOT EXISTS comments_post_id_idx ON comments(post_id)',
];

/**
 * Turn a connection string into a SQLite filename.
 *
 * Accepted forms:
 * - `:memory:`
 * - `sqlite:///relative.db`, `sqlite:////absolute/path.db`, `sqlite://` (in-memory)
 * - `file:relative.db`, `file:///absolute/path.db`
 * - a bare filesystem path
 */
export function resolveSqliteFilename(url: string): Result<string, StoreError> {
  const trimmed = url.trim();
  if (trimmed === '') {
    return err(new StoreError('Database URL is empty'));
  }
  if (trimmed === MEMORY_DATABASE) {
    return ok(MEMORY_DATABASE);
  }

  if (trimmed.toLowerCase().startsWith('sqlite://')) {
    const rest = trimmed.slice('sqlite://'.length);
    if (rest === '' || rest === '/' || rest === `/${MEMORY_DATABASE}`) {
      return ok(MEMORY_DATABASE);
    }
    // sqlite:///x.db -> "x.db", sqlite:////abs/x.db -> "/abs/x.db"
    return ok(rest.slice(1));
  }

  if (trimmed.startsWith('file://')) {
    try {
      return ok(fileURLToPath(trimmed));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return err(new StoreError(`Invalid file URL "${trimmed}": ${message}`));
    }
  }
  if (trimmed.startsWith('file:')) {
    return ok(trimmed.slice('file:'.length));
  }

  const scheme = URL_SCHEME_PATTERN.exec(trimmed);
  if (scheme) {
    return err(
      new StoreError(`Unsupported database URL scheme "${scheme[1] ?? ''}": only SQLite URLs are supported`),
    );
  }

  return ok(trimmed);
}

/**
 * Open the SQLite database behind `url` with foreign keys enforced.
 * The returned handle lives until `close()`; open it once per process.
 */
export function openDatabase(url: string): Result<BlogDatabase, StoreError> {
  const filenameResult = resolveSqliteFilename(url);
  if (filenameResult.isErr()) {
    return err(filenameResult.error);
  }
  const filename = filenameResult.value;

  let connection: Database.Database;
  try {
    connection = new Database(filename);
    connection.pragma('foreign_keys = ON');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return err(new StoreError(`Failed to open database "${filename}": ${message}`, { cause: error }));
  }

  const orm = drizzle(connection, { schema });

  return ok({
    filename,
    orm,
    connection,
    close: () => {
      if (connection.open) {
        connection.close();
      }
    },
  });
}

function execAll(database: BlogDatabase, statements: readonly string[], action: string): Result<void, StoreError> {
  try {
    const run = database.connection.transaction(() => {
      for (const statement of statements) {
        database.connection.exec(statement);
      }
    });
    run();
    return ok(undefined);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return err(new StoreError(`Failed to ${action}: ${message}`, { cause: error }));
  }
}

/** Create any missing tables and indexes. Existing data is left alone. */
export function ensureSchema(database: BlogDatabase): Result<void, StoreError> {
  return execAll(database, CREATE_STATEMENTS, 'create schema');
}

/** Drop every table and recreate the schema empty. */
export function resetSchema(database: BlogDatabase): Result<void, StoreError> {
  return execAll(database, [...DROP_STATEMENTS, ...CREATE_STATEMENTS], 'reset schema');
}

/** Row counts per table, for status output. */
export function countRows(database: BlogDatabase): Result<Record<'users' | 'categories' | 'posts' | 'comments', number>, StoreError> {
  try {
    const count = (table: string): number => {
      const row: unknown = database.connection.prepare(`SELECT COUNT(*) AS n FROM ${table}`).get();
      if (row !== null && typeof row === 'object' && 'n' in row && typeof row.n === 'number') {
        return row.n;
      }
      return 0;
    };
    return ok({
      users: count('users'),
      categories: count('categories'),
      posts: count('posts'),
      comments: count('comments'),
    });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return err(new StoreError(`Failed to count rows: ${message}`, { cause: error }));
  }
}
