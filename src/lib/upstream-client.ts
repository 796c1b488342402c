import { Errors } from './errors.js';
import type { UpstreamCallOptions, UpstreamResult } from '../types/index.js';
import type { Config, Logger } from '../config.js';

/**
 * Build the full upstream completion URL from base URL and path
 */
export function buildUpstreamUrl(config: Pick<Config, 'upstreamBaseUrl' | 'upstreamCompletionPath'>): string {
  const base = config.upstreamBaseUrl.replace(/\/+$/, '');
  const path = config.upstreamCompletionPath.startsWith('/')
    ? config.upstreamCompletionPath
    : `/${config.upstreamCompletionPath}`;
  return `${base}${path}`;
}

/**
 * Build the headers sent with every upstream call
 */
export function buildUpstreamHeaders(
  config: Pick<Config, 'upstreamApiKey' | 'upstreamAuthHeader' | 'upstreamAuthScheme'>,
  requestId: string
): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
    'X-Request-ID': requestId,
  };
  if (config.upstreamApiKey) {
    const scheme = config.upstreamAuthScheme.trim();
    headers[config.upstreamAuthHeader] = scheme ? `${scheme} ${config.upstreamApiKey}` : config.upstreamApiKey;
  }
  return headers;
}

function describeCause(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // undici wraps the socket error (ECONNREFUSED, ENOTFOUND, ...) in `cause`
  const cause: unknown = err.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
    return code ? `${code}: ${cause.message}` : cause.message;
  }
  return err.message;
}

/**
 * Anything able to perform a single upstream completion call
 */
export interface CompletionClient {
  complete(options: UpstreamCallOptions): Promise<UpstreamResult>;
}

/**
 * Performs one time-bounded POST to the upstream completion endpoint
 */
export class UpstreamClient implements CompletionClient {
  private config: Config;
  private logger: Logger;
  private readonly url: string;

  constructor(config: Config, logger: Logger) {
    this.config = config;
    this.logger = logger;
    this.url = buildUpstreamUrl(config);
  }

  /**
   * Send the payload upstream.
   *
   * @returns the upstream body, parsed as JSON when possible
   * @throws ApiError upstreamTimeout, upstreamUnavailable, upstreamError or clientClosed
   */
  async complete(options: UpstreamCallOptions): Promise<UpstreamResult> {
    const { payload, requestId, abortSignal } = options;
    const timeoutMs = this.config.requestTimeoutMs;

    if (abortSignal?.aborted) {
      throw Errors.clientClosed();
    }

    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const signal = abortSignal ? AbortSignal.any([timeoutSignal, abortSignal]) : timeoutSignal;
    const startedAt = Date.now();

    this.logger.debug('Calling upstream', {
      requestId,
      url: this.url,
      model: payload.model,
      promptLength: payload.prompt.length,
      timeoutMs,
    });

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: buildUpstreamHeaders(this.config, requestId),
        body: JSON.stringify(payload),
        signal,
      });
      status = res.status;
      ok = res.ok;
      // Reading the body is covered by the same signal
      text = await res.text();
    } catch (err) {
      if (timeoutSignal.aborted) {
        this.logger.warn('Upstream call timed out', { requestId, timeoutMs });
        throw Errors.upstreamTimeout(timeoutMs);
      }
      if (abortSignal?.aborted) {
        this.logger.info('Upstream call aborted by client', { requestId });
        throw Errors.clientClosed();
      }
      const cause = describeCause(err);
      this.logger.warn('Upstream unreachable', { requestId, cause });
      throw Errors.upstreamUnavailable(cause);
    }

    const durationMs = Date.now() - startedAt;

    if (!ok) {
      this.logger.warn('Upstream returned an error status', { requestId, status, durationMs });
      throw Errors.upstreamError(status, text);
    }

    this.logger.debug('Upstream responded', { requestId, status, durationMs, bodyLength: text.length });

    try {
      return { status, json: true, body: JSON.parse(text) };
    } catch {
      this.logger.warn('Upstream body is not JSON, passing it through', { requestId, status });
      return { status, json: false, body: text };
    }
  }
}
