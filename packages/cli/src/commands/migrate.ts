import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  loadConfig,
  openDatabase,
  ensureSchema,
  resetSchema,
  countRows,
  type ConfigError,
  type Env,
  type StoreError,
} from '@blog-api/core';

export interface MigrateOptions {
  readonly rootDir: string;
  /** Drop every table first. All data is lost. */
  readonly reset: boolean;
  readonly env?: Env;
}

export interface MigrateResult {
  readonly filename: string;
  readonly reset: boolean;
  readonly counts: Readonly<Record<'users' | 'categories' | 'posts' | 'comments', number>>;
}

/**
 * Create missing tables, or drop and recreate them all with `reset`.
 */
export async function runMigrate(options: MigrateOptions): Promise<Result<MigrateResult, ConfigError | StoreError>> {
  const configResult = await loadConfig(options.rootDir, options.env);
  if (configResult.isErr()) {
    return err(configResult.error);
  }

  const databaseResult = openDatabase(configResult.value.database.url);
  if (databaseResult.isErr()) {
    return err(databaseResult.error);
  }
  const database = databaseResult.value;

  try {
    const schemaResult = options.reset ? resetSchema(database) : ensureSchema(database);
    if (schemaResult.isErr()) {
      return err(schemaResult.error);
    }
    return countRows(database).andThen((counts) =>
      ok({ filename: database.filename, reset: options.reset, counts }),
    );
  } finally {
    database.close();
  }
}

export function formatMigrateResult(result: MigrateResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold(result.reset ? 'Schema reset' : 'Schema up to date'));
  lines.push('');
  lines.push(`  Database:   ${chalk.dim(result.filename)}`);
  lines.push(`  Users:      ${chalk.cyan(String(result.counts.users))}`);
  lines.push(`  Categories: ${chalk.cyan(String(result.counts.categories))}`);
  lines.push(`  Posts:      ${chalk.cyan(String(result.counts.posts))}`);
  lines.push(`  Comments:   ${chalk.cyan(String(result.counts.comments))}`);

  return lines.join('\n');
}

export function registerMigrateCommand(program: Command): void {
  program
    .command('migrate')
    .description('Create the blog tables if they are missing')
    .option('--reset', 'Drop and recreate every table (deletes all data)')
    .option('--root <dir>', 'Directory containing .blog-api.yaml')
    .action(async (options: { reset?: boolean; root?: string }) => {
      const result = await runMigrate({
        rootDir: resolve(options.root ?? process.cwd()),
        reset: options.reset === true,
      });

      if (result.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red('[blog-api] Migration failed:'), result.error.message);
        process.exit(1);
      }

      // eslint-disable-next-line no-console
      console.log(formatMigrateResult(result.value));
    });
}
