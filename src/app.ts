import express, { Express, Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { createApiRouter } from './routes/api.js';
import { createHealthRouter } from './routes/health.js';
import type { UpstreamPool } from './lib/upstream-pool.js';
import { ApiError, Errors, fromBodyParserError } from './lib/errors.js';
import type { Config, Logger } from './config.js';

const BODY_LIMIT = '1mb';

/**
 * Assemble the Express application. Everything it needs is passed in;
 * nothing is read from the environment here.
 */
export function createApp(config: Config, pool: UpstreamPool, logger: Logger): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Body parsing
  app.use(express.json({ limit: BODY_LIMIT }));

  // Request ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
    res.setHeader('X-Request-ID', requestId);
    next();
  });

  // Liveness and health (never call upstream)
  app.use(createHealthRouter(config, pool));

  app.use('/api', createApiRouter(pool, config, logger));

  // 404 handler
  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(Errors.notFound(req.method, req.path));
  });

  // Global error handler
  const errorHandler: ErrorRequestHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const apiError = err instanceof ApiError ? err : fromBodyParserError(err, BODY_LIMIT);

    if (apiError) {
      const log = apiError.statusCode >= 500 ? logger.error : logger.warn;
      log('Request failed', {
        requestId: res.getHeader('X-Request-ID'),
        method: req.method,
        path: req.path,
        status: apiError.statusCode,
        code: apiError.code,
        detail: apiError.detail,
      });
      if (!res.headersSent) {
        res.status(apiError.statusCode).json(apiError.toJSON());
      }
      return;
    }

    // Unexpected errors are logged but never echoed to the client
    logger.error('Unhandled request error', {
      requestId: res.getHeader('X-Request-ID'),
      error: err instanceof Error ? err.message : String(err),
      stack: config.logLevel === 'debug' && err instanceof Error ? err.stack : undefined,
    });

    const internalError = Errors.internalError();
    if (!res.headersSent) {
      res.status(internalError.statusCode).json(internalError.toJSON());
    }
  };

  app.use(errorHandler);

  return app;
}
