import bcrypt from 'bcryptjs';
import { ok, err, type Result } from 'neverthrow';
import { HashError } from '../types/errors.js';

export const DEFAULT_BCRYPT_ROUNDS = 12;

/** Modular-crypt bcrypt hash: `$2b$12$` + 22-char salt + 31-char digest. */
const BCRYPT_HASH_PATTERN = /^\$2[abxy]?\$\d{2}\$[./A-Za-z0-9]{53}$/;

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  /**
   * `ok(false)` for a wrong password. `err` only when the stored hash itself
   * is unusable, which is a local fault rather than a failed login.
   */
  verify(plain: string, storedHash: string): Promise<Result<boolean, HashError>>;
}

/**
 * bcrypt with a per-call random salt. The async API keeps the slow
 * key derivation off the request path's synchronous section.
 */
export class BcryptPasswordHasher implements PasswordHasher {
  readonly rounds: number;

  constructor(rounds: number = DEFAULT_BCRYPT_ROUNDS) {
    if (!Number.isInteger(rounds) || rounds < 4 || rounds > 31) {
      throw new RangeError(`bcrypt rounds must be an integer between 4 and 31, got ${String(rounds)}`);
    }
    this.rounds = rounds;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.rounds);
  }

  async verify(plain: string, storedHash: string): Promise<Result<boolean, HashError>> {
    if (!BCRYPT_HASH_PATTERN.test(storedHash)) {
      return err(new HashError('Stored password hash is malformed'));
    }
    try {
      // bcrypt.compare compares digests in constant time
      return ok(await bcrypt.compare(plain, storedHash));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return err(new HashError(`Stored password hash is unusable: ${message}`));
    }
  }
}
