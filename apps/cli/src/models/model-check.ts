import type { LanguageModel } from 'ai';

import { generateText } from 'ai';

import { ConfigError } from '../errors/config-error';

// Smallest output limit every supported provider accepts
const CHECK_OUTPUT_TOKENS = 16;

export interface ModelCheckOptions {
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

/**
 * Sends one short request so that a server that is down or a model name the
 * provider does not know fails the command before any chunk is refined.
 *
 * @throws ConfigError when the model does not answer
 */
export async function checkModelAvailable(
  model: LanguageModel,
  modelId: string,
  options: ModelCheckOptions,
): Promise<void> {
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const abortSignal = options.abortSignal
    ? AbortSignal.any([options.abortSignal, timeout])
    : timeout;

  try {
    await generateText({
      model,
      prompt: 'Responda apenas: ok',
      maxOutputTokens: CHECK_OUTPUT_TOKENS,
      maxRetries: 0,
      abortSignal,
    });
  } catch (error) {
    if (options.abortSignal?.aborted) {
      throw error;
    }
    throw ConfigError.fromError(`Model ${modelId} is not available`, error);
  }
}
