import { ok, err, type Result } from 'neverthrow';
import {
  loadConfig,
  openDatabase,
  ensureSchema,
  type BlogApiConfig,
  type ConfigError,
  type Env,
  type StoreError,
} from '@blog-api/core';
import { ApiServer } from './server.js';

export interface BootstrapOptions {
  readonly rootDir: string;
  /** Overrides the configured port. */
  readonly port?: number;
  readonly env?: Env;
}

export interface Bootstrapped {
  readonly server: ApiServer;
  readonly config: BlogApiConfig;
}

/**
 * Load config, open the database and make sure its tables exist, then build
 * the server. Nothing is listening yet.
 */
export async function bootstrapServer(
  options: BootstrapOptions,
): Promise<Result<Bootstrapped, ConfigError | StoreError>> {
  const configResult = await loadConfig(options.rootDir, options.env);
  if (configResult.isErr()) {
    return err(configResult.error);
  }

  const loaded = configResult.value;
  const config: BlogApiConfig = options.port === undefined
    ? loaded
    : { ...loaded, server: { ...loaded.server, port: options.port } };

  const databaseResult = openDatabase(config.database.url);
  if (databaseResult.isErr()) {
    return err(databaseResult.error);
  }
  const database = databaseResult.value;

  const schemaResult = ensureSchema(database);
  if (schemaResult.isErr()) {
    database.close();
    return err(schemaResult.error);
  }

  return ok({ server: new ApiServer({ config, database }), config });
}
