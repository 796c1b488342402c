/**
 * Error codes used throughout the application
 */
export const ErrorCodes = {
  /** Malformed or missing request fields */
  INVALID_REQUEST: 'invalid_request',
  /** Route does not exist */
  NOT_FOUND: 'not_found',
  /** Upstream answered with a non-2xx status */
  UPSTREAM_ERROR: 'upstream_error',
  /** Upstream could not be reached (refused, DNS, reset) */
  UPSTREAM_UNAVAILABLE: 'upstream_unavailable',
  /** Upstream did not answer within the configured timeout */
  UPSTREAM_TIMEOUT: 'upstream_timeout',
  /** Too many requests waiting for an upstream slot */
  QUEUE_FULL: 'queue_full',
  /** Request waited too long for an upstream slot */
  QUEUE_TIMEOUT: 'queue_timeout',
  /** Client went away before the upstream answered */
  CLIENT_CLOSED: 'client_closed',
  /** Internal server error */
  INTERNAL_ERROR: 'internal_error',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Error body returned to clients
 */
export interface ErrorBody {
  error: string;
  detail: string;
  code: ErrorCode;
}

/**
 * Custom API error class with HTTP status code and error code
 */
export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly detail: string;

  constructor(statusCode: number, code: ErrorCode, message: string, detail: string = message) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.detail = detail;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response format
   */
  toJSON(): ErrorBody {
    return {
      error: this.message,
      detail: this.detail,
      code: this.code,
    };
  }
}

/** Longest slice of an upstream error body echoed back to the client */
const MAX_DETAIL_LENGTH = 500;

function truncate(text: string): string {
  return text.length > MAX_DETAIL_LENGTH ? `${text.slice(0, MAX_DETAIL_LENGTH)}...` : text;
}

/**
 * Factory functions for common errors
 */
export const Errors = {
  invalidRequest: (message: string) =>
    new ApiError(400, ErrorCodes.INVALID_REQUEST, message),

  payloadTooLarge: (limit: string) =>
    new ApiError(413, ErrorCodes.INVALID_REQUEST, 'Request body is too large', `Maximum body size is ${limit}`),

  notFound: (method: string, path: string) =>
    new ApiError(404, ErrorCodes.NOT_FOUND, 'Endpoint not found', `${method} ${path}`),

  upstreamError: (status: number, body: string) =>
    new ApiError(
      502,
      ErrorCodes.UPSTREAM_ERROR,
      `Upstream server responded with status ${status}`,
      body ? truncate(body) : `HTTP ${status}`
    ),

  upstreamUnavailable: (cause: string) =>
    new ApiError(502, ErrorCodes.UPSTREAM_UNAVAILABLE, 'Could not connect to upstream server', cause),

  upstreamTimeout: (timeoutMs: number) =>
    new ApiError(
      504,
      ErrorCodes.UPSTREAM_TIMEOUT,
      'Upstream server did not respond in time',
      `No response after ${timeoutMs}ms`
    ),

  queueFull: (maxSize: number) =>
    new ApiError(429, ErrorCodes.QUEUE_FULL, 'Server is at capacity', `Maximum queue size (${maxSize}) reached`),

  queueTimeout: (timeoutMs: number) =>
    new ApiError(504, ErrorCodes.QUEUE_TIMEOUT, 'Request waited too long in queue', `Queue wait exceeded ${timeoutMs}ms`),

  shuttingDown: () =>
    new ApiError(502, ErrorCodes.UPSTREAM_UNAVAILABLE, 'Server is shutting down', 'No new upstream calls are accepted'),

  clientClosed: () =>
    new ApiError(499, ErrorCodes.CLIENT_CLOSED, 'Client closed the request', 'Upstream call was aborted'),

  internalError: (message: string = 'An unexpected error occurred') =>
    new ApiError(500, ErrorCodes.INTERNAL_ERROR, message),
};

/**
 * Check if an error should trigger a retry.
 * Only connection-level failures are retried; timeouts and upstream
 * HTTP errors are reported immediately.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof ApiError && error.code === ErrorCodes.UPSTREAM_UNAVAILABLE;
}

/**
 * Map an error raised by express.json() to an ApiError.
 * Returns undefined for anything that did not come from the body parser.
 */
export function fromBodyParserError(err: unknown, bodyLimit: string): ApiError | undefined {
  if (typeof err !== 'object' || err === null || !('type' in err)) {
    return undefined;
  }
  switch (err.type) {
    case 'entity.parse.failed':
      return Errors.invalidRequest('Request body must be valid JSON');
    case 'entity.too.large':
      return Errors.payloadTooLarge(bodyLimit);
    case 'encoding.unsupported':
    case 'charset.unsupported':
      return Errors.invalidRequest('Unsupported request body encoding');
    default:
      return undefined;
  }
}
