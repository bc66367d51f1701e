import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import chalk from 'chalk';
import { openDatabase, ConfigError } from '@blog-api/core';
import { createProgram } from './program.js';
import { parsePort } from './commands/serve.js';
import { runMigrate, formatMigrateResult, type MigrateResult } from './commands/migrate.js';

// --- Program Setup Tests ---

describe('CLI program setup', () => {
  let program: Command;

  beforeEach(() => {
    program = createProgram('0.1.0');
  });

  it('should create program with correct name', () => {
    expect(program.name()).toBe('blog-api');
  });

  it('should create program with correct version', () => {
    expect(program.version()).toBe('0.1.0');
  });

  it('should register serve and migrate', () => {
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['serve', 'migrate']);
  });

  it('serve command should have --port and --root options', () => {
    const serveCmd = program.commands.find((c) => c.name() === 'serve');
    expect(serveCmd?.options.map((o) => o.long)).toEqual(['--port', '--root']);
  });

  it('migrate command should have --reset and --root options', () => {
    const migrateCmd = program.commands.find((c) => c.name() === 'migrate');
    expect(migrateCmd?.options.map((o) => o.long)).toEqual(['--reset', '--root']);
  });
});

// --- Port Parsing ---

describe('parsePort', () => {
  it.each([
    ['8000', 8000],
    ['1', 1],
    ['65535', 65535],
  ])('should accept %j', (raw, expected) => {
    expect(parsePort(raw)).toBe(expected);
  });

  it.each([['0'], ['65536'], ['abc'], ['80a'], ['-1'], ['']])('should reject %j', (raw) => {
    expect(parsePort(raw)).toBeUndefined();
  });
});

// --- Migrate ---

describe('runMigrate', () => {
  let tempDir: string;
  let dbPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'blog-api-cli-'));
    dbPath = join(tempDir, 'blog.db');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function env(): Record<string, string> {
    return { DATABASE_URL: `file:${dbPath}`, SECRET_KEY: 'test-secret' };
  }

  function seedUser(): void {
    const opened = openDatabase(`file:${dbPath}`);
    if (opened.isErr()) throw opened.error;
    opened.value.connection.prepare("INSERT INTO users (username, hashed_password) VALUES ('alice', 'x')").run();
    opened.value.close();
  }

  it('should create the tables in an empty database', async () => {
    const result = await runMigrate({ rootDir: tempDir, reset: false, env: env() });

    expect(result.isOk() && result.value).toEqual({
      filename: dbPath,
      reset: false,
      counts: { users: 0, categories: 0, posts: 0, comments: 0 },
    });
  });

  it('should keep existing rows without --reset', async () => {
    await runMigrate({ rootDir: tempDir, reset: false, env: env() });
    seedUser();

    const result = await runMigrate({ rootDir: tempDir, reset: false, env: env() });

    expect(result.isOk() && result.value.counts.users).toBe(1);
  });

  it('should drop every row with --reset', async () => {
    await runMigrate({ rootDir: tempDir, reset: false, env: env() });
    seedUser();

    const result = await runMigrate({ rootDir: tempDir, reset: true, env: env() });

    expect(result.isOk() && result.value.counts.users).toBe(0);
  });

  it('should take the database url from the config file', async () => {
    await writeFile(join(tempDir, '.blog-api.yaml'), `database:\n  url: "file:${dbPath}"\n`);

    const result = await runMigrate({ rootDir: tempDir, reset: false, env: { SECRET_KEY: 'test-secret' } });

    expect(result.isOk() && result.value.filename).toBe(dbPath);
  });

  it('should fail without a database url', async () => {
    const result = await runMigrate({ rootDir: tempDir, reset: false, env: { SECRET_KEY: 'test-secret' } });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigError);
    }
  });
});

describe('formatMigrateResult', () => {
  const result: MigrateResult = {
    filename: '/srv/blog.db',
    reset: true,
    counts: { users: 2, categories: 1, posts: 5, comments: 0 },
  };

  it('should list every table count', () => {
    const lines = formatMigrateResult(result).split('\n');

    expect(lines[0]).toBe(chalk.bold('Schema reset'));
    expect(lines).toContain(`  Posts:      ${chalk.cyan('5')}`);
    expect(lines).toContain(`  Database:   ${chalk.dim('/srv/blog.db')}`);
  });

  it('should title a non-reset run differently', () => {
    const text = formatMigrateResult({ ...result, reset: false });

    expect(text.split('\n')[0]).toBe(chalk.bold('Schema up to date'));
  });
});
