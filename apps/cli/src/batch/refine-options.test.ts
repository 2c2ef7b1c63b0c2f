import { describe, expect, test } from 'vitest';

import { DEFAULT_CONFIG } from '../config/refinaria-config';
import { toRefineOptions } from './refine-options';

describe('toRefineOptions', () => {
  test('maps the configuration to pipeline options', () => {
    expect(toRefineOptions(DEFAULT_CONFIG)).toEqual({
      chunkingMode: 'paragraph-aware',
      maxWordsPerChunk: 800,
      maxRetries: 3,
      retryDelayMs: 2000,
      minContentRatio: 0.7,
      maxContentRatio: 2.0,
      globalLossThreshold: 0.5,
      contextWindowTokens: 8192,
      timeoutMs: 120_000,
      temperature: 0.1,
      normalizeInput: false,
    });
  });

  test('passes normalize_input through to the pipeline', () => {
    expect(
      toRefineOptions({ ...DEFAULT_CONFIG, normalizeInput: true }).normalizeInput,
    ).toBe(true);
  });
});
