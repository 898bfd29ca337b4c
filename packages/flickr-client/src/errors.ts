/** Flickr's `stat: "fail"` code for "Service currently unavailable". */
export const SERVICE_UNAVAILABLE_CODE = 105;

export interface FlickrUnavailableOptions {
  status?: number;
  /** Flickr API error code from a `stat: "fail"` body. */
  errorCode?: number;
  cause?: unknown;
}

/**
 * Raised when Flickr could not be reached at all: a network failure, an
 * aborted request or body read, a 5xx response, or Flickr reporting its own
 * outage. Absence of data is never reported this way; those calls resolve to
 * `null` or an empty list instead.
 */
export class FlickrUnavailableError extends Error {
  readonly status?: number;
  readonly errorCode?: number;
  readonly method: string;

  constructor(method: string, options: FlickrUnavailableOptions = {}) {
    super(`Flickr request ${method} failed: ${describeReason(options)}`, { cause: options.cause });
    this.name = 'FlickrUnavailableError';
    this.method = method;
    this.status = options.status;
    this.errorCode = options.errorCode;
  }
}

export function isFlickrUnavailableError(error: unknown): error is FlickrUnavailableError {
  return error instanceof FlickrUnavailableError;
}

function describeReason({ status, errorCode, cause }: FlickrUnavailableOptions): string {
  if (status) {
    return `HTTP ${status}`;
  }

  if (errorCode !== undefined) {
    return `error code ${errorCode}`;
  }

  return cause instanceof Error ? cause.message : 'network error';
}
