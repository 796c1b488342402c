import type { ExtractionResult } from '../types/index.js';

/**
 * Field paths probed, in order, for the completion text when
 * COMPLETION_FIELDS is not set. Covers the plain `completion` field,
 * OpenAI-style `choices`, and the shapes used by common self-hosted servers.
 */
export const DEFAULT_COMPLETION_FIELDS: readonly string[] = [
  'completion',
  'choices.0.text',
  'choices.0.message.content',
  'text',
  'response',
  'output',
  'generated_text',
  '0.generated_text',
];

/**
 * A strategy inspects an upstream body and returns the completion text,
 * or undefined when the body does not have the shape it looks for.
 */
export interface ExtractionStrategy {
  /** Label reported back when the strategy matches */
  name: string;
  extract: (body: unknown) => string | undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a dot path such as `choices.0.message.content` against a value.
 * Numeric segments index arrays; every other segment reads an object key.
 */
export function resolvePath(value: unknown, path: string): unknown {
  let current = value;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return undefined;
      current = current[Number(segment)];
    } else if (isRecord(current)) {
      if (!Object.hasOwn(current, segment)) return undefined;
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Strategy that reads a string at a dot path. An empty string matches:
 * the upstream answered in the expected shape and generated nothing.
 */
export function createPathStrategy(path: string): ExtractionStrategy {
  return {
    name: path,
    extract: (body) => {
      const value = resolvePath(body, path);
      return typeof value === 'string' ? value : undefined;
    },
  };
}

export function createStrategies(paths: readonly string[]): ExtractionStrategy[] {
  return paths.map(createPathStrategy);
}

/**
 * Run the strategies in order; the first one that returns text wins.
 */
export function extractCompletion(body: unknown, strategies: readonly ExtractionStrategy[]): ExtractionResult {
  for (const strategy of strategies) {
    const text = strategy.extract(body);
    if (text !== undefined) {
      return { kind: 'recognized', text, strategy: strategy.name, raw: body };
    }
  }
  return { kind: 'unrecognized', raw: body };
}
