import type { Response } from 'express';
import { ZodError } from 'zod';
import { PostApiError } from '../errors';
import { getErrorMessage } from './error-utils';

/**
 * Describe zod issues as one line, e.g. "title: Expected string, received number"
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}

/**
 * Render a handler failure as `{ error }` with the matching status
 */
export function handleError(
  res: Response,
  error: unknown,
  context: string
): void {
  if (error instanceof PostApiError) {
    console.warn('[POSTS] %s rejected (%s): %s', context, error.code, error.message);
    res.status(error.status).json({ error: error.message });
    return;
  }

  if (error instanceof ZodError) {
    const detail = formatZodIssues(error);
    console.warn('[POSTS] %s rejected (InvalidRequest): %s', context, detail);
    res.status(400).json({ error: `Invalid request: ${detail}` });
    return;
  }

  console.error('[POSTS] Error in %s:', context, getErrorMessage(error));
  res.status(500).json({ error: 'Internal Server Error' });
}
