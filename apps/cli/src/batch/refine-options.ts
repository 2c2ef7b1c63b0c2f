import type { RefineOptions } from '@refinaria/refiner';

import type { RefinariaConfig } from '../config/refinaria-config';

/**
 * Pipeline options carried by the configuration. Models, cache and
 * callbacks are added by the caller.
 */
export function toRefineOptions(config: RefinariaConfig): RefineOptions {
  return {
    chunkingMode: config.chunkingMode,
    maxWordsPerChunk: config.maxWordsPerChunk,
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
    minContentRatio: config.contentLossThreshold,
    maxContentRatio: config.maxContentRatio,
    globalLossThreshold: config.globalLossThreshold,
    contextWindowTokens: config.contextWindowTokens,
    timeoutMs: config.timeoutMs,
    temperature: config.temperature,
    normalizeInput: config.normalizeInput,
  };
}
