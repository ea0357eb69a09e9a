/**
 * Error taxonomy for requests against the remote catalog API.
 *
 * Every failure that leaves the HTTP client is one of these classes, so callers
 * can branch on `kind` (or `instanceof`) instead of parsing messages.
 */

export type CatalogErrorKind =
  | 'invalidRequest'
  | 'unauthorized'
  | 'rateLimited'
  | 'server'
  | 'http'
  | 'transport'
  | 'decode'
  | 'cancelled';

export abstract class CatalogError extends Error {
  public abstract readonly kind: CatalogErrorKind;

  /** Whether retrying the same request may succeed */
  public abstract readonly isRetryable: boolean;

  /** Short message suitable for showing to an end user */
  public abstract readonly userMessage: string;

  /** Whether the user has to fix something (credentials) before retrying */
  public get requiresUserAction(): boolean {
    return false;
  }

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidRequestError extends CatalogError {
  public readonly kind = 'invalidRequest';
  public readonly isRetryable = false;
  public readonly userMessage = 'Something went wrong';

  public constructor(message = 'Invalid URL', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UnauthorizedError extends CatalogError {
  public readonly kind = 'unauthorized';
  public readonly isRetryable = false;
  public readonly userMessage = 'Invalid API key';

  public constructor(message = 'Unauthorized - the API key is missing or invalid') {
    super(message);
  }

  public override get requiresUserAction(): boolean {
    return true;
  }
}

export class RateLimitedError extends CatalogError {
  public readonly kind = 'rateLimited';
  public readonly isRetryable = true;
  public readonly userMessage = 'Too many requests';
  public readonly status = 429;

  public constructor(message = 'Rate limit exceeded - try again later') {
    super(message);
  }
}

export class ServerError extends CatalogError {
  public readonly kind = 'server';
  public readonly isRetryable = true;
  public readonly userMessage = 'Server error';

  public constructor(public readonly status: number) {
    super(`Server error - HTTP ${status}`);
  }
}

/**
 * Any other non-2xx status (404, 422, ...). Never retried.
 */
export class HttpStatusError extends CatalogError {
  public readonly kind = 'http';
  public readonly isRetryable = false;

  public constructor(public readonly status: number) {
    super(`HTTP error: ${status}`);
  }

  public get userMessage(): string {
    return this.status === 404 ? 'Not found' : 'Request failed';
  }
}

export class TransportError extends CatalogError {
  public readonly kind = 'transport';
  public readonly isRetryable = true;
  public readonly userMessage = 'No internet connection';

  public constructor(message: string, options?: { cause?: unknown }) {
    super(`Network error: ${message}`, options);
  }
}

export interface DecodeIssue {
  path: (string | number)[];
  message: string;
}

export class DecodeError extends CatalogError {
  public readonly kind = 'decode';
  public readonly isRetryable = false;
  public readonly userMessage = 'Something went wrong';

  public constructor(
    public readonly endpoint: string,
    public readonly issues: DecodeIssue[],
    options?: { cause?: unknown }
  ) {
    super(`Failed to decode response for ${endpoint}: ${issues.map(formatIssue).join('; ')}`, options);
  }
}

export class CancelledError extends CatalogError {
  public readonly kind = 'cancelled';
  public readonly isRetryable = false;
  public readonly userMessage = 'Cancelled';

  public constructor(message = 'The operation was cancelled') {
    super(message);
  }
}

const formatIssue = (issue: DecodeIssue): string =>
  issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;

/**
 * Map a non-2xx HTTP status to its error class.
 */
export const errorFromStatus = (status: number): CatalogError => {
  if (status === 401 || status === 403) {
    return new UnauthorizedError();
  }
  if (status === 429) {
    return new RateLimitedError();
  }
  if (status >= 500 && status <= 599) {
    return new ServerError(status);
  }
  return new HttpStatusError(status);
};

export const isCancellation = (error: unknown): boolean => {
  if (error instanceof CancelledError) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
};

/**
 * Normalise anything thrown on the request path into a CatalogError.
 * fetch rejects with a TypeError on connectivity failures and with an
 * AbortError when its signal fires.
 */
export const toCatalogError = (error: unknown): CatalogError => {
  if (error instanceof CatalogError) {
    return error;
  }
  if (isCancellation(error)) {
    return new CancelledError();
  }
  if (error instanceof Error) {
    return new TransportError(error.message, { cause: error });
  }
  return new TransportError(String(error));
};
