import type { LanguageModel } from 'ai';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';

import { ConfigError } from '../errors/config-error';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

const KNOWN_PROVIDERS = ['ollama', 'openai', 'anthropic'] as const;

type Provider = (typeof KNOWN_PROVIDERS)[number];

function isProvider(value: string): value is Provider {
  return KNOWN_PROVIDERS.some((provider) => provider === value);
}

/**
 * Splits "provider/model-name" into its parts. An id without a known
 * provider prefix names an Ollama model, so "llama3.2:latest" and
 * "ollama/llama3.2:latest" are the same model.
 */
export function parseModelId(modelId: string): {
  provider: Provider;
  modelName: string;
} {
  const [prefix, ...rest] = modelId.split('/');
  if (rest.length > 0 && isProvider(prefix)) {
    return { provider: prefix, modelName: rest.join('/') };
  }
  return { provider: 'ollama', modelName: modelId };
}

/**
 * Converts model ID string to LanguageModel instance
 *
 * Model ID format: "provider/model-name"
 * Examples:
 *   - "ollama/llama3.2:latest" (Ollama's OpenAI-compatible endpoint at OLLAMA_BASE_URL)
 *   - "openai/gpt-4o-mini"
 *   - "anthropic/claude-3-5-haiku-latest"
 *
 * @throws ConfigError when a hosted provider's API key is missing
 */
export function createModel(
  modelId: string,
  env: NodeJS.ProcessEnv = process.env,
): LanguageModel {
  const { provider, modelName } = parseModelId(modelId);

  switch (provider) {
    case 'ollama':
      return createOpenAI({
        name: 'ollama',
        baseURL: env.OLLAMA_BASE_URL || DEFAULT_OLLAMA_BASE_URL,
        apiKey: 'ollama',
      }).chat(modelName);
    case 'openai':
      return createOpenAI({
        apiKey: requireKey(env, 'OPENAI_API_KEY', modelId),
      })(modelName);
    case 'anthropic':
      return createAnthropic({
        apiKey: requireKey(env, 'ANTHROPIC_API_KEY', modelId),
      })(modelName);
  }
}

function requireKey(
  env: NodeJS.ProcessEnv,
  name: string,
  modelId: string,
): string {
  const key = env[name];
  if (!key) {
    throw new ConfigError(`${name} must be set to use ${modelId}`);
  }
  return key;
}
