import { createHmac, timingSafeEqual } from 'node:crypto';
import { ok, err, type Result } from 'neverthrow';
import { InvalidCredentialsError } from '../types/errors.js';

export const TOKEN_ALGORITHM = 'HS256';
export const DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES = 30;

/** Single message for every token failure so callers cannot tell them apart. */
export const INVALID_TOKEN_MESSAGE = 'Could not validate credentials';

export interface TokenClaims {
  readonly sub: string;
  /** Expiry, seconds since the Unix epoch. */
  readonly exp: number;
}

export interface IssuedToken {
  readonly token: string;
  readonly claims: TokenClaims;
}

export interface TokenServiceOptions {
  readonly secret: string;
  readonly expiresInMinutes?: number;
  /** Clock in milliseconds. Defaults to `Date.now`. */
  readonly now?: () => number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function base64UrlEncode(input: Buffer | string): string {
  return Buffer.from(input).toString('base64url');
}

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

function base64UrlToBuffer(input: string): Buffer | undefined {
  if (!BASE64URL_PATTERN.test(input)) return undefined;
  return Buffer.from(input, 'base64url');
}

/** Parse a JSON object safely, returning `undefined` on failure. */
function safeJsonObject(raw: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return undefined;
  } catch {
    return undefined;
  }
}

const ENCODED_HEADER = base64UrlEncode(JSON.stringify({ alg: TOKEN_ALGORITHM, typ: 'JWT' }));

// ---------------------------------------------------------------------------
// TokenService
// ---------------------------------------------------------------------------

/**
 * Issues and verifies compact HS256 JWTs carrying `{sub, exp}`.
 *
 * Verification checks, in order: structure and algorithm, signature, expiry,
 * subject. Every failure is reported as the same `InvalidCredentialsError`.
 * Resolving the subject to a stored user is the caller's job.
 */
export class TokenService {
  private readonly secret: string;
  private readonly expiresInSeconds: number;
  private readonly now: () => number;

  constructor(options: TokenServiceOptions) {
    if (!options.secret) {
      throw new Error('Token signing secret must not be empty');
    }
    const minutes = options.expiresInMinutes ?? DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES;
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw new RangeError(`Token lifetime must be positive, got ${String(minutes)} minutes`);
    }
    this.secret = options.secret;
    this.expiresInSeconds = Math.floor(minutes * 60);
    this.now = options.now ?? Date.now;
  }

  issue(subject: string): IssuedToken {
    const claims: TokenClaims = {
      sub: subject,
      exp: Math.floor(this.now() / 1000) + this.expiresInSeconds,
    };
    const signingInput = `${ENCODED_HEADER}.${base64UrlEncode(JSON.stringify(claims))}`;
    return {
      token: `${signingInput}.${this.sign(signingInput)}`,
      claims,
    };
  }

  verify(token: string): Result<TokenClaims, InvalidCredentialsError> {
    const parts = token.split('.');
    const [headerB64, payloadB64, signatureB64] = parts;
    if (parts.length !== 3 || headerB64 === undefined || payloadB64 === undefined || signatureB64 === undefined) {
      return invalid();
    }

    const headerBytes = base64UrlToBuffer(headerB64);
    const header = headerBytes ? safeJsonObject(headerBytes.toString('utf-8')) : undefined;
    if (!header || header['alg'] !== TOKEN_ALGORITHM) {
      return invalid();
    }

    const signature = base64UrlToBuffer(signatureB64);
    if (!signature || !this.signatureMatches(`${headerB64}.${payloadB64}`, signature)) {
      return invalid();
    }

    const payloadBytes = base64UrlToBuffer(payloadB64);
    const payload = payloadBytes ? safeJsonObject(payloadBytes.toString('utf-8')) : undefined;
    if (!payload) {
      return invalid();
    }

    const exp = payload['exp'];
    const nowSeconds = Math.floor(this.now() / 1000);
    if (typeof exp !== 'number' || !Number.isFinite(exp) || exp <= nowSeconds) {
      return invalid();
    }

    const sub = payload['sub'];
    if (typeof sub !== 'string' || sub.length === 0) {
      return invalid();
    }

    return ok({ sub, exp });
  }

  private sign(signingInput: string): string {
    return createHmac('sha256', this.secret).update(signingInput).digest('base64url');
  }

  private signatureMatches(signingInput: string, signature: Buffer): boolean {
    const expected = createHmac('sha256', this.secret).update(signingInput).digest();
    return signature.length === expected.length && timingSafeEqual(signature, expected);
  }
}

function invalid(): Result<never, InvalidCredentialsError> {
  return err(new InvalidCredentialsError(INVALID_TOKEN_MESSAGE));
}
