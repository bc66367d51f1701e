import { describe, it, expect } from 'vitest';
import { parsePathId, postRequestSchema, postListQuerySchema, credentialsSchema } from './schemas.js';

describe('parsePathId', () => {
  it.each([
    ['1', 1],
    ['42', 42],
    ['01', 1],
    ['007', 7],
  ])('should parse %j', (raw, expected) => {
    expect(parsePathId(raw)).toBe(expected);
  });

  it.each([[undefined], [''], ['0'], ['00'], ['-1'], ['1.5'], ['abc'], ['1e3'], ['99999999999999999999']])(
    'should reject %j',
    (raw) => {
      expect(parsePathId(raw)).toBeUndefined();
    },
  );
});

describe('postRequestSchema', () => {
  it('should accept a missing or null category', () => {
    expect(postRequestSchema.safeParse({ title: 'T', content: 'C' }).success).toBe(true);
    expect(postRequestSchema.safeParse({ title: 'T', content: 'C', category_id: null }).success).toBe(true);
  });

  it('should keep the title as sent', () => {
    const parsed = postRequestSchema.safeParse({ title: '  padded ', content: 'C' });

    expect(parsed.success && parsed.data.title).toBe('  padded ');
  });

  it.each([[0], [-3], [1.5], ['2']])('should reject category_id %j', (categoryId) => {
    expect(postRequestSchema.safeParse({ title: 'T', content: 'C', category_id: categoryId }).success).toBe(false);
  });
});

describe('postListQuerySchema', () => {
  it('should coerce a numeric query string', () => {
    const parsed = postListQuerySchema.safeParse({ category_id: '3' });

    expect(parsed.success && parsed.data.category_id).toBe(3);
  });

  it('should allow no filter', () => {
    const parsed = postListQuerySchema.safeParse({});

    expect(parsed.success && parsed.data.category_id).toBeUndefined();
  });

  it('should treat category_id 0 as no filter', () => {
    const parsed = postListQuerySchema.safeParse({ category_id: '0' });

    expect(parsed.success).toBe(true);
    expect(parsed.success && parsed.data.category_id).toBeUndefined();
  });

  it('should reject a negative category_id', () => {
    expect(postListQuerySchema.safeParse({ category_id: '-2' }).success).toBe(false);
  });
});

describe('credentialsSchema', () => {
  it('should accept a password of spaces but not an empty one', () => {
    expect(credentialsSchema.safeParse({ username: 'alice', password: '   ' }).success).toBe(true);
    expect(credentialsSchema.safeParse({ username: 'alice', password: '' }).success).toBe(false);
  });
});
