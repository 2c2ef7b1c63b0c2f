import type { LanguageModel } from 'ai';

export type ProviderType = 'openai' | 'anthropic' | 'ollama' | 'unknown';

/**
 * Detect the provider type from a LanguageModel instance.
 *
 * Reads the `provider` field of the model object (`ollama.chat`,
 * `openai.responses`, `anthropic.messages`, ...) and matches it against
 * known provider identifiers. A bare model id string is 'unknown'.
 */
export function detectProvider(model: LanguageModel): ProviderType {
  if (typeof model === 'string') return 'unknown';

  const providerId = model.provider;
  if (!providerId) return 'unknown';

  if (providerId.includes('ollama')) return 'ollama';
  if (providerId.includes('openai')) return 'openai';
  if (providerId.includes('anthropic')) return 'anthropic';

  return 'unknown';
}
