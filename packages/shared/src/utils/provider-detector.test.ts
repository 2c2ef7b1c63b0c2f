import type { LanguageModel } from 'ai';

import { describe, expect, test } from 'vitest';

import { detectProvider } from './provider-detector';

function createModelWithProvider(provider: string): LanguageModel {
  return { provider, modelId: 'test-model' } as unknown as LanguageModel;
}

describe('detectProvider', () => {
  test('detects an Ollama model served through the OpenAI-compatible API', () => {
    expect(detectProvider(createModelWithProvider('ollama.chat'))).toBe(
      'ollama',
    );
  });

  test('detects OpenAI provider', () => {
    expect(detectProvider(createModelWithProvider('openai.responses'))).toBe(
      'openai',
    );
  });

  test('detects Anthropic provider', () => {
    expect(detectProvider(createModelWithProvider('anthropic.messages'))).toBe(
      'anthropic',
    );
  });

  test('returns unknown for unrecognized provider string', () => {
    expect(
      detectProvider(createModelWithProvider('some-custom-provider')),
    ).toBe('unknown');
  });

  test('returns unknown when provider field is empty string', () => {
    expect(detectProvider(createModelWithProvider(''))).toBe('unknown');
  });

  test('returns unknown for a bare model id', () => {
    expect(detectProvider('openai/gpt-4o-mini')).toBe('unknown');
  });
});
