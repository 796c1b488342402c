import { Router, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { CompletionResponse, UpstreamPayload } from '../types/index.js';
import { Errors } from '../lib/errors.js';
import { createStrategies, extractCompletion, isRecord } from '../lib/extraction.js';
import type { UpstreamPool } from '../lib/upstream-pool.js';
import type { Config, Logger } from '../config.js';

/**
 * Validate a CompletionRequest body and fill in configured defaults
 *
 * @throws ApiError invalidRequest when a field is missing or malformed
 */
export function toUpstreamPayload(body: unknown, config: Config): UpstreamPayload {
  if (!isRecord(body)) {
    throw Errors.invalidRequest('Request body must be a JSON object');
  }

  const { prompt } = body;

  if (typeof prompt !== 'string') {
    throw Errors.invalidRequest('Request body must include a "prompt" string');
  }

  if (prompt.length === 0) {
    throw Errors.invalidRequest('Prompt cannot be empty');
  }

  let model = config.defaultModel;
  if (body.model !== undefined) {
    if (typeof body.model !== 'string' || body.model.trim().length === 0) {
      throw Errors.invalidRequest('model must be a non-empty string');
    }
    model = body.model;
  }

  let maxTokens = config.defaultMaxTokens;
  if (body.max_tokens !== undefined) {
    if (typeof body.max_tokens !== 'number' || !Number.isInteger(body.max_tokens) || body.max_tokens < 1) {
      throw Errors.invalidRequest('max_tokens must be a positive integer');
    }
    maxTokens = body.max_tokens;
  }

  let temperature = config.defaultTemperature;
  if (body.temperature !== undefined) {
    if (typeof body.temperature !== 'number' || !(body.temperature >= 0 && body.temperature <= 2)) {
      throw Errors.invalidRequest('temperature must be a number between 0 and 2');
    }
    temperature = body.temperature;
  }

  return {
    model,
    prompt,
    max_tokens: maxTokens,
    temperature,
  };
}

/**
 * Create API router with the completion endpoint
 */
export function createApiRouter(pool: UpstreamPool, config: Config, logger: Logger): Router {
  const router = Router();
  const strategies = createStrategies(config.completionFields);

  /**
   * POST /api/complete
   * Forward a prompt to the upstream completion server
   */
  router.post('/complete', async (req: Request, res: Response) => {
    const requestId = res.getHeader('X-Request-ID')?.toString() || uuidv4();
    const startTime = Date.now();

    const payload = toUpstreamPayload(req.body, config);

    logger.info('Received completion request', {
      requestId,
      model: payload.model,
      promptLength: payload.prompt.length,
    });

    // Abort the upstream call if the client disconnects before we answer
    const abortController = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        logger.info('Client disconnected, aborting request', { requestId });
        abortController.abort();
      }
    };
    res.on('close', onClose);

    try {
      const upstream = await pool.submit({
        payload,
        requestId,
        abortSignal: abortController.signal,
      });

      const extraction = extractCompletion(upstream.body, strategies);

      logger.info('Completion request finished', {
        requestId,
        durationMs: Date.now() - startTime,
        upstreamStatus: upstream.status,
        recognized: extraction.kind === 'recognized',
        ...(extraction.kind === 'recognized' && { field: extraction.strategy }),
        ...(!upstream.json && { upstreamJson: false }),
      });

      const response: CompletionResponse = {
        id: requestId,
        model: payload.model,
        response: extraction.kind === 'recognized' ? extraction.text : null,
        raw_response: extraction.raw,
      };

      res.json(response);
    } finally {
      res.off('close', onClose);
    }
  });

  return router;
}
