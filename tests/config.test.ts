import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig, createLogger, ConfigError } from '../src/config.js';
import { DEFAULT_COMPLETION_FIELDS } from '../src/lib/extraction.js';

const baseEnv = { UPSTREAM_BASE_URL: 'http://localhost:8008' };

describe('loadConfig', () => {
  it('requires UPSTREAM_BASE_URL', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ UPSTREAM_BASE_URL: '  ' })).toThrow(
      'UPSTREAM_BASE_URL environment variable is required'
    );
  });

  it('applies defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config.upstreamBaseUrl).toBe('http://localhost:8008');
    expect(config.upstreamCompletionPath).toBe('/v1/completions');
    expect(config.port).toBe(5000);
    expect(config.defaultModel).toBe('smallcloud/Refact-1_6B-fim');
    expect(config.requestTimeoutMs).toBe(60000);
    expect(config.logLevel).toBe('info');
    expect(config.upstreamApiKey).toBeUndefined();
    expect(config.upstreamAuthHeader).toBe('Authorization');
    expect(config.upstreamAuthScheme).toBe('Bearer');
    expect(config.completionFields).toEqual(DEFAULT_COMPLETION_FIELDS);
    expect(config.defaultMaxTokens).toBe(200);
    expect(config.defaultTemperature).toBe(0.7);
    expect(config.upstreamConcurrency).toBe(8);
    expect(config.maxQueueSize).toBe(100);
    expect(config.queueTimeoutMs).toBe(30000);
    expect(config.upstreamRetries).toBe(1);
    expect(config.retryDelayMs).toBe(250);
  });

  it('returns a frozen object', () => {
    const config = loadConfig(baseEnv);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.completionFields)).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ...baseEnv,
      UPSTREAM_COMPLETION_PATH: 'generate',
      PORT: '8080',
      DEFAULT_MODEL: 'starcoder',
      REQUEST_TIMEOUT_MS: '1500',
      LOG_LEVEL: 'debug',
      UPSTREAM_API_KEY: 'test-secret',
      UPSTREAM_AUTH_HEADER: 'X-Api-Key',
      UPSTREAM_AUTH_SCHEME: '',
      COMPLETION_FIELDS: ' result , data.text ,',
      UPSTREAM_RETRIES: '0',
    });

    expect(config.upstreamCompletionPath).toBe('/generate');
    expect(config.port).toBe(8080);
    expect(config.defaultModel).toBe('starcoder');
    expect(config.requestTimeoutMs).toBe(1500);
    expect(config.logLevel).toBe('debug');
    expect(config.upstreamApiKey).toBe('test-secret');
    expect(config.upstreamAuthHeader).toBe('X-Api-Key');
    expect(config.upstreamAuthScheme).toBe('');
    expect(config.completionFields).toEqual(['result', 'data.text']);
    expect(config.upstreamRetries).toBe(0);
  });

  it.each([
    [{ UPSTREAM_BASE_URL: 'not a url' }, 'UPSTREAM_BASE_URL must be an http(s) URL'],
    [{ UPSTREAM_BASE_URL: 'ftp://localhost' }, 'UPSTREAM_BASE_URL must be an http(s) URL'],
    [{ ...baseEnv, PORT: 'abc' }, 'PORT must be an integer'],
    [{ ...baseEnv, PORT: '70000' }, 'PORT must be a valid port number (1-65535)'],
    [{ ...baseEnv, REQUEST_TIMEOUT_MS: '50' }, 'REQUEST_TIMEOUT_MS must be at least 100ms'],
    [{ ...baseEnv, LOG_LEVEL: 'verbose' }, 'LOG_LEVEL must be one of: debug, info, warn, error'],
    [{ ...baseEnv, COMPLETION_FIELDS: ' , ' }, 'COMPLETION_FIELDS must name at least one field'],
    [{ ...baseEnv, DEFAULT_TEMPERATURE: '3' }, 'DEFAULT_TEMPERATURE must be between 0 and 2'],
    [{ ...baseEnv, UPSTREAM_CONCURRENCY: '0' }, 'UPSTREAM_CONCURRENCY must be at least 1'],
    [{ ...baseEnv, UPSTREAM_RETRIES: '2' }, 'UPSTREAM_RETRIES must be 0 or 1'],
    [{ ...baseEnv, RETRY_DELAY_MS: '-1' }, 'RETRY_DELAY_MS must not be negative'],
  ])('rejects invalid environment %#', (env, message) => {
    expect(() => loadConfig(env)).toThrow(message);
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters messages below the configured level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('upstream slow', { requestId: 'req-1' });
    logger.error('upstream down');

    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy.mock.calls[0][0]).toMatch(/^\[[^\]]+\] \[WARN\] upstream slow \{"requestId":"req-1"\}$/);
    expect(logSpy.mock.calls[1][0]).toMatch(/^\[[^\]]+\] \[ERROR\] upstream down$/);
  });
});
