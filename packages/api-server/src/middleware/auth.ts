import type { Request } from 'express';
import type { Result } from 'neverthrow';
import type {
  Authenticator,
  InvalidCredentialsError,
  StoreError,
  StoreSession,
  User,
} from '@blog-api/core';

/**
 * Resolve the caller from the request's `Authorization: Bearer <token>`
 * header. Handlers that need identity call this first and stop on `err`.
 */
export function currentUser(
  authenticator: Authenticator,
  req: Request,
  session: StoreSession,
): Result<User, InvalidCredentialsError | StoreError> {
  return authenticator.authenticateHeader(session, req.headers['authorization']);
}
