export type ResourceKind = 'user' | 'category' | 'post' | 'comment';

/** A uniquely-named resource (username, category name) already exists. */
export class DuplicateResourceError extends Error {
  readonly resource: ResourceKind;

  constructor(resource: ResourceKind, message: string) {
    super(message);
    this.name = 'DuplicateResourceError';
    this.resource = resource;
  }
}

/**
 * The resource does not exist, or exists but belongs to someone else.
 * Callers cannot tell the two apart.
 */
export class NotFoundError extends Error {
  readonly resource: ResourceKind;

  constructor(resource: ResourceKind, message: string) {
    super(message);
    this.name = 'NotFoundError';
    this.resource = resource;
  }
}

/**
 * Bad login, or a token that is malformed, expired, wrongly signed or names
 * an unknown user. Callers never learn which.
 */
export class InvalidCredentialsError extends Error {
  /** Value for the WWW-Authenticate response header. */
  readonly challenge = 'Bearer';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidCredentialsError';
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

/** A stored password hash could not be parsed. */
export class HashError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HashError';
  }
}

export type BlogError =
  | DuplicateResourceError
  | NotFoundError
  | InvalidCredentialsError
  | StoreError
  | HashError;
