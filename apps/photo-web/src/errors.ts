export type AppErrorCode =
  | 'auth_required'
  | 'bad_request'
  | 'not_found'
  | 'upstream_unavailable'
  | 'store_unavailable';

/** Base class for failures the HTTP layer knows how to render. */
export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: AppErrorCode;
}

/** The session carries no usable access token. */
export class AuthRequiredError extends AppError {
  readonly statusCode = 401;
  readonly code = 'auth_required';

  constructor(message = 'Not authenticated') {
    super(message);
    this.name = 'AuthRequiredError';
  }
}

export class BadRequestError extends AppError {
  readonly statusCode = 400;
  readonly code = 'bad_request';

  constructor(message = 'Invalid request payload') {
    super(message);
    this.name = 'BadRequestError';
  }
}

/** Flickr confirmed the requested entity does not exist or returned nothing for it. */
export class UpstreamNotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'not_found';

  constructor(message = 'Not found') {
    super(message);
    this.name = 'UpstreamNotFoundError';
  }
}

/** Flickr could not be reached; nothing was cached and the call may be retried. */
export class UpstreamUnavailableError extends AppError {
  readonly statusCode = 503;
  readonly code = 'upstream_unavailable';

  constructor(
    message = 'Flickr is currently unavailable',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'UpstreamUnavailableError';
  }
}

/** The session or cache store failed. */
export class StoreUnavailableError extends AppError {
  readonly statusCode = 500;
  readonly code = 'store_unavailable';

  constructor(
    message = 'Session store is unavailable',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StoreUnavailableError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
