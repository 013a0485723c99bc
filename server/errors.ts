/**
 * Error types returned to API clients
 */

export type PostApiErrorCode =
  | 'MissingField'
  | 'NoChange'
  | 'NotFound'
  | 'MissingQuery'
  | 'InvalidRequest';

const STATUS_BY_CODE: Record<PostApiErrorCode, number> = {
  MissingField: 400,
  NoChange: 400,
  NotFound: 404,
  MissingQuery: 400,
  InvalidRequest: 400,
};

/**
 * A user-visible failure with a fixed HTTP status
 * Thrown by handlers and rendered by handleError as { error: message }
 */
export class PostApiError extends Error {
  readonly code: PostApiErrorCode;
  readonly status: number;

  constructor(code: PostApiErrorCode, message: string) {
    super(message);
    this.name = 'PostApiError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
  }
}

export function missingFieldError(): PostApiError {
  return new PostApiError('MissingField', 'Please fill out required fields');
}

export function noChangeError(): PostApiError {
  return new PostApiError('NoChange', 'Bad request: Nothing was changed');
}

export function postNotFoundError(postId: number): PostApiError {
  return new PostApiError('NotFound', `Post with id (${postId}) do not exist.`);
}

export function missingQueryError(): PostApiError {
  return new PostApiError('MissingQuery', 'Please provide title or content query');
}
