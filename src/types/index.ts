/**
 * Request body for POST /api/complete
 */
export interface CompletionRequest {
  /** The prompt forwarded upstream verbatim */
  prompt: string;
  /** Optional model name; falls back to the configured default */
  model?: string;
  /** Optional generation length limit */
  max_tokens?: number;
  /** Optional sampling temperature */
  temperature?: number;
}

/**
 * JSON body sent to the upstream completion endpoint
 */
export interface UpstreamPayload {
  model: string;
  prompt: string;
  max_tokens: number;
  temperature: number;
}

/**
 * Body returned by the upstream on a 2xx answer.
 * `json` is false when the body could not be parsed, in which case
 * `body` holds the raw text.
 */
export interface UpstreamResult {
  status: number;
  json: boolean;
  body: unknown;
}

/**
 * Outcome of probing an upstream body for the completion text
 */
export type ExtractionResult =
  | { kind: 'recognized'; text: string; strategy: string; raw: unknown }
  | { kind: 'unrecognized'; raw: unknown };

/**
 * Successful response from POST /api/complete
 */
export interface CompletionResponse {
  /** Unique request identifier */
  id: string;
  /** Model sent upstream */
  model: string;
  /** Extracted completion text, or null when the upstream shape was not recognized */
  response: string | null;
  /** Full upstream body */
  raw_response: unknown;
}

/**
 * Health check response
 */
export interface HealthResponse {
  /** Server status */
  status: 'ok' | 'degraded';
  /** Server uptime in seconds */
  uptime: number;
  upstream: {
    baseUrl: string;
    completionPath: string;
  };
  queue: {
    /** Requests waiting for an upstream slot */
    pending: number;
    /** Upstream calls in flight */
    processing: number;
    /** Maximum simultaneous upstream calls */
    concurrency: number;
  };
}

/**
 * Upstream pool statistics
 */
export interface UpstreamPoolStats {
  /** Requests waiting for an upstream slot */
  pending: number;
  /** Upstream calls in flight */
  processing: number;
  /** Maximum simultaneous upstream calls */
  concurrency: number;
  /** Maximum queue size */
  maxQueueSize: number;
  /** Whether the pool is paused */
  isPaused: boolean;
}

/**
 * Options for a single upstream call
 */
export interface UpstreamCallOptions {
  payload: UpstreamPayload;
  /** Propagated to the upstream as X-Request-ID */
  requestId: string;
  /** Abort signal for client disconnects */
  abortSignal?: AbortSignal;
}
