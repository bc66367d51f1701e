import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  resolveSqliteFilename,
  openDatabase,
  ensureSchema,
  resetSchema,
  countRows,
  MEMORY_DATABASE,
  type BlogDatabase,
} from './database.js';
import { StoreError } from '../types/errors.js';

describe('resolveSqliteFilename', () => {
  it.each([
    [':memory:', ':memory:'],
    ['sqlite://', ':memory:'],
    ['sqlite:///:memory:', ':memory:'],
    ['sqlite:///blog.db', 'blog.db'],
    ['sqlite:////var/data/blog.db', '/var/data/blog.db'],
    ['file:blog.db', 'blog.db'],
    ['file:///var/data/blog.db', '/var/data/blog.db'],
    ['./data/blog.db', './data/blog.db'],
    ['  blog.db  ', 'blog.db'],
  ])('should resolve %s to %s', (url, expected) => {
    const result = resolveSqliteFilename(url);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toBe(expected);
    }
  });

  it('should reject non-SQLite schemes', () => {
    const result = resolveSqliteFilename('postgresql://user@localhost/blog');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(StoreError);
      expect(result.error.message).toBe(
        'Unsupported database URL scheme "postgresql": only SQLite URLs are supported',
      );
    }
  });

  it('should reject an empty URL', () => {
    const result = resolveSqliteFilename('   ');

    expect(result.isErr()).toBe(true);
  });
});

describe('openDatabase', () => {
  let database: BlogDatabase | null = null;
  let tempDir: string | null = null;

  afterEach(() => {
    database?.close();
    database = null;
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('should open an in-memory database with foreign keys enabled', () => {
    const result = openDatabase(MEMORY_DATABASE);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      database = result.value;
      expect(database.filename).toBe(':memory:');
      expect(database.connection.pragma('foreign_keys', { simple: true })).toBe(1);
    }
  });

  it('should create the database file for a sqlite URL', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'blog-api-db-'));
    const path = join(tempDir, 'blog.db');

    const result = openDatabase(`sqlite:///${path}`);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      database = result.value;
      expect(database.filename).toBe(path);
      expect(existsSync(path)).toBe(true);
    }
  });

  it('should report a directory that does not exist', () => {
    const result = openDatabase('/nonexistent-dir-for-blog-api/sub/blog.db');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toContain('Failed to open database');
    }
  });

  it('should close idempotently', () => {
    const result = openDatabase(MEMORY_DATABASE);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      result.value.close();
      expect(() => result.value.close()).not.toThrow();
      expect(result.value.connection.open).toBe(false);
    }
  });
});

describe('schema management', () => {
  let database: BlogDatabase;

  function open(): BlogDatabase {
    const result = openDatabase(MEMORY_DATABASE);
    if (result.isErr()) throw result.error;
    return result.value;
  }

  afterEach(() => {
    database.close();
  });

  it('should create all four tables', () => {
    database = open();

    expect(ensureSchema(database).isOk()).toBe(true);

    const tables = database.connection
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .pluck()
      .all();
    expect(tables).toEqual(['categories', 'comments', 'posts', 'users']);
  });

  it('should keep existing rows when ensuring the schema again', () => {
    database = open();
    ensureSchema(database);
    database.connection.prepare("INSERT INTO categories (name) VALUES ('news')").run();

    expect(ensureSchema(database).isOk()).toBe(true);

    const counts = countRows(database);
    expect(counts.isOk()).toBe(true);
    if (counts.isOk()) {
      expect(counts.value.categories).toBe(1);
    }
  });

  it('should empty every table on reset', () => {
    database = open();
    ensureSchema(database);
    database.connection.prepare("INSERT INTO users (username, hashed_password) VALUES ('alice', 'x')").run();
    database.connection.prepare("INSERT INTO categories (name) VALUES ('news')").run();

    expect(resetSchema(database).isOk()).toBe(true);

    const counts = countRows(database);
    expect(counts.isOk()).toBe(true);
    if (counts.isOk()) {
      expect(counts.value).toEqual({ users: 0, categories: 0, posts: 0, comments: 0 });
    }
  });

  it('should fail to count rows before the schema exists', () => {
    database = open();

    const counts = countRows(database);

    expect(counts.isErr()).toBe(true);
    if (counts.isErr()) {
      expect(counts.error.message).toContain('no such table');
    }
  });
});
