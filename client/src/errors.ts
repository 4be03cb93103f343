/**
 * Base error for everything the client throws.
 * `internalError` carries the shop's `X-oekobox-error` header when present.
 */
export class OekoboxError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly internalError?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'OekoboxError';
  }
}

/**
 * Credentials rejected (HTTP 401/403 or a logon result code), or a
 * session-gated call made while logged out.
 */
export class OekoboxAuthenticationError extends OekoboxError {
  constructor(message: string, statusCode?: number, internalError?: string) {
    super(message, statusCode, internalError);
    this.name = 'OekoboxAuthenticationError';
  }
}

/**
 * No response was obtained: network failure or timeout.
 * The underlying failure is kept as `cause`.
 */
export class OekoboxConnectionError extends OekoboxError {
  constructor(message: string, cause?: unknown) {
    super(message, undefined, undefined, { cause });
    this.name = 'OekoboxConnectionError';
  }
}

/** Any other failed response. */
export class OekoboxApiError extends OekoboxError {
  public readonly responseData: unknown;

  constructor(message: string, statusCode?: number, internalError?: string, responseData?: unknown) {
    super(message, statusCode, internalError);
    this.name = 'OekoboxApiError';
    this.responseData = responseData ?? null;
  }
}

/** A precondition failed locally, or a response had an unexpected shape. */
export class OekoboxValidationError extends OekoboxError {
  constructor(message: string, statusCode?: number, internalError?: string) {
    super(message, statusCode, internalError);
    this.name = 'OekoboxValidationError';
  }
}
