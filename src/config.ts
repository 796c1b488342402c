import { DEFAULT_COMPLETION_FIELDS } from './lib/extraction.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Bridge configuration loaded from environment variables.
 * Built once at startup and never mutated afterwards.
 */
export interface Config {
  /** Server port */
  readonly port: number;
  /** Base URL of the upstream completion server */
  readonly upstreamBaseUrl: string;
  /** Path of the completion endpoint on the upstream server */
  readonly upstreamCompletionPath: string;
  /** Model sent upstream when the request names none */
  readonly defaultModel: string;
  /** Upper bound for a single upstream call in milliseconds */
  readonly requestTimeoutMs: number;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Credential sent to the upstream server, if any */
  readonly upstreamApiKey?: string;
  /** Header carrying the upstream credential */
  readonly upstreamAuthHeader: string;
  /** Scheme prefix for the credential; empty sends the bare key */
  readonly upstreamAuthScheme: string;
  /** Ordered dot paths probed for the completion text */
  readonly completionFields: readonly string[];
  /** max_tokens sent upstream when the request names none */
  readonly defaultMaxTokens: number;
  /** temperature sent upstream when the request names none */
  readonly defaultTemperature: number;
  /** Number of simultaneous upstream calls */
  readonly upstreamConcurrency: number;
  /** Maximum requests waiting for an upstream slot */
  readonly maxQueueSize: number;
  /** Maximum time a request can wait for an upstream slot in ms */
  readonly queueTimeoutMs: number;
  /** Retries after a transient network failure (0 or 1) */
  readonly upstreamRetries: number;
  /** Delay before the retry in ms */
  readonly retryDelayMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const upstreamBaseUrl = env.UPSTREAM_BASE_URL?.trim();
  const port = intFrom(env, 'PORT', 5000);
  const requestTimeoutMs = intFrom(env, 'REQUEST_TIMEOUT_MS', 60000);
  const logLevel = env.LOG_LEVEL || 'info';
  const defaultMaxTokens = intFrom(env, 'DEFAULT_MAX_TOKENS', 200);
  const defaultTemperature = Number(env.DEFAULT_TEMPERATURE || '0.7');
  const upstreamConcurrency = intFrom(env, 'UPSTREAM_CONCURRENCY', 8);
  const maxQueueSize = intFrom(env, 'MAX_QUEUE_SIZE', 100);
  const queueTimeoutMs = intFrom(env, 'QUEUE_TIMEOUT_MS', 30000);
  const upstreamRetries = intFrom(env, 'UPSTREAM_RETRIES', 1);
  const retryDelayMs = intFrom(env, 'RETRY_DELAY_MS', 250);

  let upstreamCompletionPath = env.UPSTREAM_COMPLETION_PATH?.trim() || '/v1/completions';
  if (!upstreamCompletionPath.startsWith('/')) {
    upstreamCompletionPath = `/${upstreamCompletionPath}`;
  }

  const completionFields = env.COMPLETION_FIELDS
    ? env.COMPLETION_FIELDS.split(',').map((f) => f.trim()).filter((f) => f.length > 0)
    : DEFAULT_COMPLETION_FIELDS;

  // Validation
  if (!upstreamBaseUrl) {
    throw new ConfigError('UPSTREAM_BASE_URL environment variable is required');
  }

  if (!URL.canParse(upstreamBaseUrl) || !/^https?:$/.test(new URL(upstreamBaseUrl).protocol)) {
    throw new ConfigError('UPSTREAM_BASE_URL must be an http(s) URL');
  }

  if (port < 1 || port > 65535) {
    throw new ConfigError('PORT must be a valid port number (1-65535)');
  }

  if (requestTimeoutMs < 100) {
    throw new ConfigError('REQUEST_TIMEOUT_MS must be at least 100ms');
  }

  if (!isLogLevel(logLevel)) {
    throw new ConfigError('LOG_LEVEL must be one of: debug, info, warn, error');
  }

  if (completionFields.length === 0) {
    throw new ConfigError('COMPLETION_FIELDS must name at least one field');
  }

  if (defaultMaxTokens < 1) {
    throw new ConfigError('DEFAULT_MAX_TOKENS must be at least 1');
  }

  if (!Number.isFinite(defaultTemperature) || defaultTemperature < 0 || defaultTemperature > 2) {
    throw new ConfigError('DEFAULT_TEMPERATURE must be between 0 and 2');
  }

  if (upstreamConcurrency < 1) {
    throw new ConfigError('UPSTREAM_CONCURRENCY must be at least 1');
  }

  if (maxQueueSize < 1) {
    throw new ConfigError('MAX_QUEUE_SIZE must be at least 1');
  }

  if (queueTimeoutMs < 100) {
    throw new ConfigError('QUEUE_TIMEOUT_MS must be at least 100ms');
  }

  if (upstreamRetries < 0 || upstreamRetries > 1) {
    throw new ConfigError('UPSTREAM_RETRIES must be 0 or 1');
  }

  if (retryDelayMs < 0) {
    throw new ConfigError('RETRY_DELAY_MS must not be negative');
  }

  return Object.freeze({
    port,
    upstreamBaseUrl,
    upstreamCompletionPath,
    defaultModel: env.DEFAULT_MODEL?.trim() || 'smallcloud/Refact-1_6B-fim',
    requestTimeoutMs,
    logLevel,
    upstreamApiKey: env.UPSTREAM_API_KEY || undefined,
    upstreamAuthHeader: env.UPSTREAM_AUTH_HEADER?.trim() || 'Authorization',
    upstreamAuthScheme: env.UPSTREAM_AUTH_SCHEME ?? 'Bearer',
    completionFields: Object.freeze(completionFields),
    defaultMaxTokens,
    defaultTemperature,
    upstreamConcurrency,
    maxQueueSize,
    queueTimeoutMs,
    upstreamRetries,
    retryDelayMs,
  });
}

/**
 * Simple logger that respects log level
 */
export function createLogger(level: LogLevel) {
  const levels = { debug: 0, info: 1, warn: 2, error: 3 };
  const currentLevel = levels[level];

  const log = (msgLevel: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (levels[msgLevel] >= currentLevel) {
      const timestamp = new Date().toISOString();
      const logData = data ? ` ${JSON.stringify(data)}` : '';
      console.log(`[${timestamp}] [${msgLevel.toUpperCase()}] ${message}${logData}`);
    }
  };

  return {
    debug: (message: string, data?: Record<string, unknown>) => log('debug', message, data),
    info: (message: string, data?: Record<string, unknown>) => log('info', message, data),
    warn: (message: string, data?: Record<string, unknown>) => log('warn', message, data),
    error: (message: string, data?: Record<string, unknown>) => log('error', message, data),
  };
}

export type Logger = ReturnType<typeof createLogger>;
