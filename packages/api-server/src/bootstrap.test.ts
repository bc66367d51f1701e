import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import request from 'supertest';
import { ConfigError, StoreError } from '@blog-api/core';
import { bootstrapServer } from './bootstrap.js';

describe('bootstrapServer', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'blog-api-boot-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should refuse to boot without a signing secret', async () => {
    const result = await bootstrapServer({ rootDir: tempDir, env: { DATABASE_URL: ':memory:' } });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toContain('secret key is required (set SECRET_KEY)');
    }
  });

  it('should refuse a non-SQLite database url', async () => {
    const result = await bootstrapServer({
      rootDir: tempDir,
      env: { DATABASE_URL: 'postgresql://localhost/blog', SECRET_KEY: 'test-secret' },
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(StoreError);
      expect(result.error.message).toBe(
        'Unsupported database URL scheme "postgresql": only SQLite URLs are supported',
      );
    }
  });

  it('should build a working server with the schema in place', async () => {
    const result = await bootstrapServer({
      rootDir: tempDir,
      port: 0,
      env: { DATABASE_URL: ':memory:', SECRET_KEY: 'test-secret', BCRYPT_ROUNDS: '4' },
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const { server, config } = result.value;
      expect(config.server.port).toBe(0);
      const res = await request(server.getApp()).get('/categories');
      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
      await server.close();
    }
  });

  it('should create the database file for a sqlite url', async () => {
    const dbPath = join(tempDir, 'blog.db');
    const result = await bootstrapServer({
      rootDir: tempDir,
      env: { DATABASE_URL: `sqlite:///${dbPath}`, SECRET_KEY: 'test-secret', BCRYPT_ROUNDS: '4' },
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const res = await request(result.value.server.getApp())
        .post('/users')
        .send({ username: 'alice', password: 'pw-alice' });
      expect(res.status).toBe(200);
      await result.value.server.close();
    }
  });
});
