import { StoreError } from '../../types/errors.js';

/** SQLite extended result code carried by better-sqlite3 errors, if any. */
export function sqliteErrorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return sqliteErrorCode(error.cause);
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  const code = sqliteErrorCode(error);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

export function isForeignKeyViolation(error: unknown): boolean {
  return sqliteErrorCode(error) === 'SQLITE_CONSTRAINT_FOREIGNKEY';
}

export function toStoreError(action: string, error: unknown): StoreError {
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new StoreError(`Failed to ${action}: ${message}`, { cause: error });
}
