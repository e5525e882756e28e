/**
 * TTKIA SDK error classes
 *
 * Every failure surfaced by the client is a TTKIAError carrying a stable
 * `code`. HTTP failures are ApiErrors; 401/403 and 404 get their own
 * subclasses so callers can branch with instanceof.
 */

export class TTKIAError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown before any request is sent when a local argument is missing or invalid.
 */
export class ValidationError extends TTKIAError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, "VALIDATION_ERROR", field);
  }
}

/**
 * Thrown for any non-2xx response not covered by a more specific subclass.
 */
export class ApiError extends TTKIAError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string,
    code: string = "API_ERROR"
  ) {
    super(message, code, body || undefined);
  }
}

/** 401 and 403 responses */
export class AuthError extends ApiError {
  constructor(message: string, status: number, body: string) {
    super(message, status, body, "AUTH_ERROR");
  }
}

/** 404 responses */
export class NotFoundError extends ApiError {
  constructor(message: string, status: number, body: string) {
    super(message, status, body, "NOT_FOUND");
  }
}

/**
 * Thrown when the request never produced a response: connection refused,
 * DNS failure, timeout or an aborted signal.
 */
export class NetworkError extends TTKIAError {
  public readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, "NETWORK_ERROR", undefined, { cause: options.cause });
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Thrown when a local file cannot be read for upload.
 */
export class FileError extends TTKIAError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, "FILE_ERROR", path, { cause });
  }
}

/**
 * Thrown when a 2xx response body does not have the shape an endpoint returns.
 */
export class InvalidResponseError extends TTKIAError {
  constructor(
    public readonly endpoint: string,
    reason: string
  ) {
    super(`Invalid response from ${endpoint}: ${reason}`, "INVALID_RESPONSE", reason);
  }
}

/**
 * Map a non-2xx HTTP response onto the error taxonomy.
 */
export function createApiError(
  status: number,
  statusText: string,
  body: string
): ApiError {
  const message = `HTTP ${status}: ${statusText}${body ? ` - ${body}` : ""}`;

  if (status === 401 || status === 403) {
    return new AuthError(message, status, body);
  }
  if (status === 404) {
    return new NotFoundError(message, status, body);
  }
  return new ApiError(message, status, body);
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
