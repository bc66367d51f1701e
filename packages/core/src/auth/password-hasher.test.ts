import { describe, it, expect } from 'vitest';
import { BcryptPasswordHasher } from './password-hasher.js';
import { HashError } from '../types/errors.js';

// Minimum cost keeps the suite fast; the algorithm is the same.
const hasher = new BcryptPasswordHasher(4);

describe('BcryptPasswordHasher', () => {
  it('should verify a password against its own hash', async () => {
    const hash = await hasher.hash('correct horse');

    const result = await hasher.verify('correct horse', hash);

    expect(result.isOk() && result.value).toBe(true);
  });

  it('should produce a different hash on every call', async () => {
    const first = await hasher.hash('same input');
    const second = await hasher.hash('same input');

    expect(first).not.toBe(second);
    expect((await hasher.verify('same input', first)).isOk()).toBe(true);
    const secondResult = await hasher.verify('same input', second);
    expect(secondResult.isOk() && secondResult.value).toBe(true);
  });

  it('should not contain the plaintext', async () => {
    const hash = await hasher.hash('plaintext-secret');

    expect(hash).not.toContain('plaintext-secret');
    expect(hash.startsWith('$2')).toBe(true);
    expect(hash).toHaveLength(60);
  });

  it('should reject a different password', async () => {
    const hash = await hasher.hash('password-one');

    const result = await hasher.verify('password-two', hash);

    expect(result.isOk()).toBe(true);
    expect(result.isOk() && result.value).toBe(false);
  });

  it('should reject an empty password against a real hash', async () => {
    const hash = await hasher.hash('not-empty');

    const result = await hasher.verify('', hash);

    expect(result.isOk() && result.value).toBe(false);
  });

  it('should encode the configured cost', async () => {
    const hash = await hasher.hash('cost check');

    expect(hash.slice(3, 7)).toBe('$04$');
  });

  it('should report a malformed stored hash as a HashError', async () => {
    const result = await hasher.verify('anything', 'not-a-bcrypt-hash');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(HashError);
      expect(result.error.message).toBe('Stored password hash is malformed');
    }
  });

  it('should report a truncated hash as a HashError', async () => {
    const hash = await hasher.hash('truncate me');

    const result = await hasher.verify('truncate me', hash.slice(0, 40));

    expect(result.isErr()).toBe(true);
  });

  it('should refuse an out-of-range cost', () => {
    expect(() => new BcryptPasswordHasher(3)).toThrow(RangeError);
    expect(() => new BcryptPasswordHasher(32)).toThrow(RangeError);
    expect(() => new BcryptPasswordHasher(10.5)).toThrow(RangeError);
  });
});
