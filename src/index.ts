import { createServer, Server } from 'node:http';
import type { Socket } from 'node:net';
import { loadConfig, createLogger } from './config.js';
import type { Config } from './config.js';
import { createApp } from './app.js';
import { UpstreamClient } from './lib/upstream-client.js';
import { UpstreamPool } from './lib/upstream-pool.js';

// Load configuration; a bad environment is fatal
let config: Config;
try {
  config = loadConfig();
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[${new Date().toISOString()}] [ERROR] Invalid configuration: ${message}`);
  process.exit(1);
}

const logger = createLogger(config.logLevel);

const client = new UpstreamClient(config, logger);
const pool = new UpstreamPool(client, config, logger);
const app = createApp(config, pool, logger);

// Create HTTP server
const server: Server = createServer(app);

// Track active connections for graceful shutdown
const connections = new Set<Socket>();

server.on('connection', (conn) => {
  connections.add(conn);
  conn.on('close', () => connections.delete(conn));
});

// Graceful shutdown handler
let isShuttingDown = false;

async function shutdown(signal: string, exitCode = 0): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}, starting graceful shutdown...`);

  // Anything still open past this point is cut
  const forceTimeout = config.requestTimeoutMs + 5000;
  const forceTimer = setTimeout(() => {
    logger.error('Forced shutdown due to timeout', { openConnections: connections.size });
    connections.forEach((conn) => conn.destroy());
    process.exit(1);
  }, forceTimeout);
  forceTimer.unref();

  // Stop accepting new connections; idle keep-alive sockets are closed now
  server.close(() => {
    logger.info('HTTP server closed');
  });
  server.closeIdleConnections();

  // Wait for in-flight upstream calls
  await pool.shutdown();

  // Wait for connections to drain
  const drainInterval = setInterval(() => {
    server.closeIdleConnections();
    if (connections.size === 0) {
      clearInterval(drainInterval);
      clearTimeout(forceTimer);
      logger.info('Graceful shutdown complete');
      process.exit(exitCode);
    }
  }, 100);
}

function startShutdown(signal: string, exitCode?: number): void {
  shutdown(signal, exitCode).catch((err: unknown) => {
    logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
}

// Register signal handlers
process.on('SIGTERM', () => startShutdown('SIGTERM'));
process.on('SIGINT', () => startShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception', { error: err.message, stack: err.stack });
  startShutdown('uncaughtException', 1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: String(reason) });
  // Don't shutdown on unhandled rejection, just log
});

server.on('error', (err) => {
  logger.error('HTTP server error', { error: err.message });
  process.exit(1);
});

// Start server
server.listen(config.port, () => {
  logger.info(`Completion bridge listening on port ${config.port}`, {
    nodeVersion: process.version,
    logLevel: config.logLevel,
    upstream: `${new URL(config.upstreamBaseUrl).origin}${config.upstreamCompletionPath}`,
    defaultModel: config.defaultModel,
    requestTimeoutMs: config.requestTimeoutMs,
    upstreamConcurrency: config.upstreamConcurrency,
  });
});
