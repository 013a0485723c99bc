import { z } from 'zod';
import type { SearchCriteria, SortOptions } from '../types';

/**
 * First value of a query parameter; repeated parameters arrive as arrays
 * and nested ones as objects
 */
function firstQueryValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

const queryValue = z.preprocess(firstQueryValue, z.string().optional());

/**
 * Falsy JSON values (null, false, 0, "", [] and {}) count as a missing field
 */
export function isBlankJsonValue(value: unknown): boolean {
  if (!value) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

// Blank values become undefined; any other non-string is rejected
const bodyText = z.preprocess(
  (value) => (isBlankJsonValue(value) ? undefined : value),
  z.string().optional()
);

const jsonBody = <T extends z.ZodRawShape>(shape: T) =>
  z.preprocess((body) => body ?? {}, z.object(shape));

/** GET /api/posts */
export const listPostsSchema = z
  .object({
    sort: queryValue,
    direction: queryValue,
  })
  .transform(
    ({ sort, direction }): SortOptions => ({
      field: sort === 'title' || sort === 'content' ? sort : undefined,
      direction: direction?.toLowerCase() === 'desc' ? 'desc' : 'asc',
    })
  );

/** GET /api/posts/search */
export const searchPostsSchema = z
  .object({
    title: queryValue,
    content: queryValue,
  })
  .transform(
    ({ title, content }): SearchCriteria => ({
      title: title || undefined,
      content: content || undefined,
    })
  );

/** POST /api/posts */
export const createPostSchema = jsonBody({
  title: bodyText,
  content: bodyText,
});

/** PUT /api/posts/:postId */
export const updatePostSchema = jsonBody({
  title: bodyText,
  content: bodyText,
});

export const postIdParamsSchema = z.object({
  postId: z
    .string()
    .regex(/^\d+$/, 'post id must be a non-negative integer')
    .transform(Number),
});
