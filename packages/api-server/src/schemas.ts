import { z } from 'zod';

export const EMPTY_FIELD_MESSAGE = 'Field cannot be empty';
export const EMPTY_COMMENT_MESSAGE = 'Comment cannot be empty';

function nonBlank(message: string) {
  return z.string().refine((value) => value.trim().length > 0, message);
}

export const credentialsSchema = z.object({
  username: nonBlank(EMPTY_FIELD_MESSAGE),
  password: z.string().min(1, EMPTY_FIELD_MESSAGE),
});

export type CredentialsRequest = z.infer<typeof credentialsSchema>;

export const categoryRequestSchema = z.object({
  name: nonBlank(EMPTY_FIELD_MESSAGE),
});

export type CategoryRequest = z.infer<typeof categoryRequestSchema>;

export const postRequestSchema = z.object({
  title: nonBlank(EMPTY_FIELD_MESSAGE),
  content: nonBlank(EMPTY_FIELD_MESSAGE),
  category_id: z.number().int().positive().nullable().optional(),
});

export type PostRequest = z.infer<typeof postRequestSchema>;

export const commentRequestSchema = z.object({
  content: nonBlank(EMPTY_COMMENT_MESSAGE),
});

export type CommentRequest = z.infer<typeof commentRequestSchema>;

/** A `category_id` of 0 means no filter. */
export const postListQuerySchema = z.object({
  category_id: z.coerce
    .number()
    .int()
    .nonnegative()
    .optional()
    .transform((id) => (id === 0 ? undefined : id)),
});

const PATH_ID_PATTERN = /^\d+$/;

/** Positive integer path segment, leading zeros allowed, or `undefined` for anything else. */
export function parsePathId(raw: string | undefined): number | undefined {
  if (raw === undefined || !PATH_ID_PATTERN.test(raw)) {
    return undefined;
  }
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}
