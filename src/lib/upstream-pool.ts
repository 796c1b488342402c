import PQueue from 'p-queue';
import { Errors, isRetryableError } from './errors.js';
import type { CompletionClient } from './upstream-client.js';
import type { UpstreamCallOptions, UpstreamPoolStats, UpstreamResult } from '../types/index.js';
import type { Config, Logger } from '../config.js';

/**
 * Bounds the number of simultaneous upstream calls with p-queue and
 * retries a call once when the upstream could not be reached.
 */
export class UpstreamPool {
  private queue: PQueue;
  private client: CompletionClient;
  private config: Config;
  private logger: Logger;
  private isShuttingDown = false;

  constructor(client: CompletionClient, config: Config, logger: Logger) {
    this.client = client;
    this.config = config;
    this.logger = logger;

    this.queue = new PQueue({ concurrency: config.upstreamConcurrency });

    this.logger.info('Upstream pool initialized', {
      concurrency: config.upstreamConcurrency,
      maxQueueSize: config.maxQueueSize,
      queueTimeoutMs: config.queueTimeoutMs,
      retries: config.upstreamRetries,
    });
  }

  /**
   * Submit an upstream call to the pool
   *
   * @throws ApiError if the queue is full, the wait is too long, or the upstream call fails
   */
  async submit(options: UpstreamCallOptions): Promise<UpstreamResult> {
    if (this.isShuttingDown) {
      throw Errors.shuttingDown();
    }

    const maxAttempts = this.config.upstreamRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.executeWithQueue(options);
      } catch (error) {
        if (!isRetryableError(error) || attempt >= maxAttempts || this.isShuttingDown) {
          throw error;
        }

        this.logger.info('Retrying upstream call', {
          requestId: options.requestId,
          attempt: attempt + 1,
          maxAttempts,
          delayMs: this.config.retryDelayMs,
          error: error instanceof Error ? error.message : 'Unknown',
        });

        await this.delay(this.config.retryDelayMs, options.abortSignal);
      }
    }
  }

  /**
   * Abortable delay between attempts
   */
  private delay(ms: number, abortSignal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (abortSignal?.aborted) {
        reject(Errors.clientClosed());
        return;
      }
      const abortHandler = () => {
        clearTimeout(timeoutId);
        reject(Errors.clientClosed());
      };
      const timeoutId = setTimeout(() => {
        abortSignal?.removeEventListener('abort', abortHandler);
        resolve();
      }, ms);
      abortSignal?.addEventListener('abort', abortHandler, { once: true });
    });
  }

  private async executeWithQueue(options: UpstreamCallOptions): Promise<UpstreamResult> {
    const { requestId } = options;

    if (this.queue.size >= this.config.maxQueueSize) {
      this.logger.warn('Queue capacity exceeded, rejecting request', {
        requestId,
        queueSize: this.queue.size,
        maxQueueSize: this.config.maxQueueSize,
      });
      throw Errors.queueFull(this.config.maxQueueSize);
    }

    this.logger.debug('Request queued', {
      requestId,
      queuePosition: this.queue.size,
      inFlight: this.queue.pending,
    });

    return new Promise<UpstreamResult>((resolve, reject) => {
      let timedOut = false;

      // Bound the wait for a slot
      const waitTimer = setTimeout(() => {
        timedOut = true;
        this.logger.warn('Request waited too long in queue', {
          requestId,
          queueTimeoutMs: this.config.queueTimeoutMs,
        });
        reject(Errors.queueTimeout(this.config.queueTimeoutMs));
      }, this.config.queueTimeoutMs);

      this.queue
        .add(async () => {
          clearTimeout(waitTimer);
          // Caller already received queue_timeout; release the slot at once
          if (timedOut) return;
          if (this.isShuttingDown) {
            reject(Errors.shuttingDown());
            return;
          }
          try {
            resolve(await this.client.complete(options));
          } catch (err) {
            reject(err);
          }
        })
        .catch(reject);
    });
  }

  /**
   * Get current pool statistics
   */
  getStats(): UpstreamPoolStats {
    return {
      pending: this.queue.size,
      processing: this.queue.pending,
      concurrency: this.config.upstreamConcurrency,
      maxQueueSize: this.config.maxQueueSize,
      isPaused: this.queue.isPaused,
    };
  }

  /**
   * Check if the pool is healthy (queue below 90% of capacity)
   */
  isHealthy(): boolean {
    return this.queue.size < this.config.maxQueueSize * 0.9;
  }

  /**
   * Stop accepting calls and wait for the queue to drain.
   * Calls still waiting for a slot are rejected when they reach it.
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    this.logger.info('Shutting down upstream pool', {
      waiting: this.queue.size,
      inFlight: this.queue.pending,
    });

    await this.queue.onIdle();

    this.logger.info('Upstream pool shutdown complete');
  }
}
