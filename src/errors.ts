/**
 * Base class for any non-2xx answer the core surfaces to its caller.
 */
export class ApiError extends Error {
  readonly endpoint: string;
  readonly status: number;

  constructor(message: string, endpoint: string, status: number) {
    super(message);
    this.name = "ApiError";
    this.endpoint = endpoint;
    this.status = status;
  }
}

/** 401: missing, bad or expired credential. Fatal to the run. */
export class AuthError extends ApiError {
  constructor(endpoint: string) {
    super(`Authentication failed for ${endpoint}`, endpoint, 401);
    this.name = "AuthError";
  }
}

/** 403 with quota still available. */
export class ForbiddenError extends ApiError {
  constructor(endpoint: string) {
    super(`Access forbidden for ${endpoint}`, endpoint, 403);
    this.name = "ForbiddenError";
  }
}

/** 403 with exhausted quota, or 429. */
export class RateLimitError extends ApiError {
  readonly resetAt?: number;

  constructor(endpoint: string, status: number, resetAt?: number) {
    super(
      `Rate limit exceeded for ${endpoint}${resetAt !== undefined ? ` (resets at ${new Date(resetAt * 1000).toISOString()})` : ""}`,
      endpoint,
      status
    );
    this.name = "RateLimitError";
    this.resetAt = resetAt;
  }
}

/** Any other non-2xx status. Not retried by the core. */
export class TransientApiError extends ApiError {
  constructor(endpoint: string, status: number) {
    super(`Request to ${endpoint} failed with status ${status}`, endpoint, status);
    this.name = "TransientApiError";
  }
}

/**
 * Map a non-2xx, non-404 status to the matching error.
 *
 * @param remaining - Parsed `X-RateLimit-Remaining`, if the response carried one.
 * @param reset - Parsed `X-RateLimit-Reset` in epoch seconds.
 */
export function errorForStatus(endpoint: string, status: number, remaining?: number, reset?: number): ApiError {
  if (status === 401) {
    return new AuthError(endpoint);
  }
  if (status === 429 || (status === 403 && remaining === 0)) {
    return new RateLimitError(endpoint, status, reset);
  }
  if (status === 403) {
    return new ForbiddenError(endpoint);
  }
  return new TransientApiError(endpoint, status);
}

export function describeError(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
