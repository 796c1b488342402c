import { vi } from 'vitest';
import type { Config, Logger } from '../../src/config.js';
import { DEFAULT_COMPLETION_FIELDS } from '../../src/lib/extraction.js';

export function createTestConfig(overrides: Partial<Config> = {}): Config {
  return {
    port: 5000,
    upstreamBaseUrl: 'http://127.0.0.1:8008',
    upstreamCompletionPath: '/v1/completions',
    defaultModel: 'test-model',
    requestTimeoutMs: 300,
    logLevel: 'error',
    upstreamAuthHeader: 'Authorization',
    upstreamAuthScheme: 'Bearer',
    completionFields: DEFAULT_COMPLETION_FIELDS,
    defaultMaxTokens: 200,
    defaultTemperature: 0.7,
    upstreamConcurrency: 4,
    maxQueueSize: 10,
    queueTimeoutMs: 5000,
    upstreamRetries: 1,
    retryDelayMs: 0,
    ...overrides,
  };
}

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
