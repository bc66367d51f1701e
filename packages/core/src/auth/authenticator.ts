import { ok, err, type Result } from 'neverthrow';
import type { AccessTokenResponse, NewUser, User, UserRecord } from '../types/entities.js';
import {
  DuplicateResourceError,
  InvalidCredentialsError,
  type HashError,
  type StoreError,
} from '../types/errors.js';
import type { StoreSession } from '../storage/session.js';
import type { PasswordHasher } from './password-hasher.js';
import { INVALID_TOKEN_MESSAGE, type TokenService } from './token-service.js';

export const INVALID_LOGIN_MESSAGE = 'Incorrect username or password';

const BEARER_PREFIX = /^Bearer\s+/i;

export interface AuthenticatorDeps {
  readonly hasher: PasswordHasher;
  readonly tokens: TokenService;
}

function toUser(record: UserRecord): User {
  return { id: record.id, username: record.username };
}

/**
 * Pull the token out of an `Authorization` header value. Anything other
 * than a non-empty `Bearer` credential yields `undefined`.
 */
export function parseBearerToken(headerValue: string | undefined): string | undefined {
  if (!headerValue || !BEARER_PREFIX.test(headerValue)) {
    return undefined;
  }
  const token = headerValue.replace(BEARER_PREFIX, '').trim();
  return token.length > 0 ? token : undefined;
}

/**
 * Registration, login, and resolution of the current user from a bearer
 * token. Stateless: every call works against the session it is given.
 */
export class Authenticator {
  private readonly hasher: PasswordHasher;
  private readonly tokens: TokenService;

  constructor(deps: AuthenticatorDeps) {
    this.hasher = deps.hasher;
    this.tokens = deps.tokens;
  }

  async register(
    session: StoreSession,
    input: NewUser,
  ): Promise<Result<User, DuplicateResourceError | StoreError>> {
    const existing = session.repositories.users.findByUsername(input.username);
    if (existing.isErr()) {
      return err(existing.error);
    }
    if (existing.value) {
      return err(new DuplicateResourceError('user', 'Username already registered'));
    }

    const passwordHash = await this.hasher.hash(input.password);

    // The unique constraint still guards a registration that raced ours
    // while the hash was being computed.
    const created = session.transaction((repos) => repos.users.create(input.username, passwordHash));
    return created.map(toUser);
  }

  async login(
    session: StoreSession,
    username: string,
    password: string,
  ): Promise<Result<AccessTokenResponse, InvalidCredentialsError | HashError | StoreError>> {
    const found = session.repositories.users.findByUsername(username);
    if (found.isErr()) {
      return err(found.error);
    }
    const user = found.value;
    if (!user) {
      return err(new InvalidCredentialsError(INVALID_LOGIN_MESSAGE));
    }

    const verified = await this.hasher.verify(password, user.passwordHash);
    if (verified.isErr()) {
      return err(verified.error);
    }
    if (!verified.value) {
      return err(new InvalidCredentialsError(INVALID_LOGIN_MESSAGE));
    }

    const { token } = this.tokens.issue(user.username);
    return ok({ access_token: token, token_type: 'bearer' });
  }

  /**
   * The authorization guard. Verifies the token and resolves its subject to
   * a stored user; a valid signature alone is not enough.
   */
  resolveCurrentUser(
    session: StoreSession,
    token: string | undefined,
  ): Result<User, InvalidCredentialsError | StoreError> {
    if (!token) {
      return err(new InvalidCredentialsError(INVALID_TOKEN_MESSAGE));
    }

    const claims = this.tokens.verify(token);
    if (claims.isErr()) {
      return err(claims.error);
    }

    const found = session.repositories.users.findByUsername(claims.value.sub);
    if (found.isErr()) {
      return err(found.error);
    }
    if (!found.value) {
      return err(new InvalidCredentialsError(INVALID_TOKEN_MESSAGE));
    }
    return ok(toUser(found.value));
  }

  /** `resolveCurrentUser` for a raw `Authorization` header value. */
  authenticateHeader(
    session: StoreSession,
    authorizationHeader: string | undefined,
  ): Result<User, InvalidCredentialsError | StoreError> {
    return this.resolveCurrentUser(session, parseBearerToken(authorizationHeader));
  }
}
