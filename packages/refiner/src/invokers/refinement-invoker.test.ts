import type { LoggerMethods } from '@refinaria/logger';
import type { Chunk } from '@refinaria/model';
import type { LLMTextCallConfig } from '@refinaria/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@refinaria/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import type { ContentStyleClassifier } from '../classifiers/content-style-classifier';

import { ContractViolationError } from '../errors/contract-violation-error';
import {
  buildRefinementSystemPrompt,
  buildRefinementUserPrompt,
} from '../prompts/refinement-prompts';
import { InMemoryRefinementCache } from './refinement-cache';
import { RefinementInvoker, estimateTokens } from './refinement-invoker';

vi.mock('@refinaria/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@refinaria/shared')>();
  return {
    ...actual,
    LLMCaller: {
      call: vi.fn(),
      callText: vi.fn(),
      extractModelName: actual.LLMCaller.extractModelName,
    },
  };
});

const TEXT =
  'Hoje vamos falar da ética de Aristóteles e da noção de virtude como hábito adquirido pela prática.';

const usage = {
  component: 'RefinementInvoker',
  phase: 'refinement',
  model: 'primary' as const,
  modelName: 'test-model',
  inputTokens: 100,
  outputTokens: 25,
  totalTokens: 125,
};

function chunkOf(text: string, index = 0): Chunk {
  return {
    index,
    text,
    wordCount: text.split(/\s+/).length,
    sourceOffset: { start: 0, end: text.length },
  };
}

function answer(output: string) {
  return { output, usage, usedFallbackModel: false };
}

/**
 * Model stand-in that returns the text between the transcript tags
 */
function echo(config: LLMTextCallConfig) {
  const match = /<transcricao>\n([\s\S]*)\n<\/transcricao>/.exec(
    config.userPrompt,
  );
  return Promise.resolve(answer(match ? match[1] : ''));
}

describe('RefinementInvoker', () => {
  let mockLogger: LoggerMethods;
  let mockModel: LanguageModel;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    mockModel = { modelId: 'test-model' } as unknown as LanguageModel;
  });

  function createInvoker(
    options: ConstructorParameters<typeof RefinementInvoker>[2] = {},
  ) {
    return new RefinementInvoker(mockLogger, mockModel, {
      retryDelayMs: 0,
      ...options,
    });
  }

  test('accepts an answer within the content ratio bounds', async () => {
    vi.mocked(LLMCaller.callText).mockImplementation(echo);

    const result = await createInvoker().refine(chunkOf(TEXT, 1), 3);

    expect(result).toEqual({
      chunkIndex: 1,
      refinedText: TEXT,
      usedFallback: false,
      attemptCount: 1,
      contentRatio: 1,
      finalState: 'succeeded',
      fromCache: false,
      pieces: 1,
      history: [
        { kind: 'attempting', attempt: 1, emphasized: false },
        { kind: 'succeeded', contentRatio: 1 },
      ],
    });
    const config = vi.mocked(LLMCaller.callText).mock.calls[0][0];
    expect(config).toMatchObject({
      primaryModel: mockModel,
      maxRetries: 0,
      temperature: 0,
      component: 'RefinementInvoker',
      phase: 'refinement',
    });
    expect(config.userPrompt.split('\n')[0]).toBe(
      'Transcrição (parte 2 de 3):',
    );
  });

  test('strips fences and labels from the answer', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValueOnce(
      answer('```\nTexto corrigido:\n' + TEXT + '\n```'),
    );

    const result = await createInvoker().refine(chunkOf(TEXT));

    expect(result.refinedText).toBe(TEXT);
    expect(result.finalState).toBe('succeeded');
  });

  test('falls back after a truncated answer and an emphasized retry', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(answer(TEXT.slice(0, 30)));
    const ratio = 30 / 98;

    const result = await createInvoker().refine(chunkOf(TEXT));

    expect(result).toEqual({
      chunkIndex: 0,
      refinedText: TEXT,
      usedFallback: true,
      attemptCount: 2,
      contentRatio: 1,
      finalState: 'fallen-back',
      fallbackReason: 'content-loss',
      fromCache: false,
      pieces: 1,
      history: [
        { kind: 'attempting', attempt: 1, emphasized: false },
        { kind: 'degraded', contentRatio: ratio },
        { kind: 'attempting', attempt: 2, emphasized: true },
        { kind: 'degraded', contentRatio: ratio },
        { kind: 'fallen-back', reason: 'content-loss' },
      ],
    });
    const prompts = vi
      .mocked(LLMCaller.callText)
      .mock.calls.map(([config]) => config.userPrompt);
    expect(prompts[0].startsWith('Transcrição')).toBe(true);
    expect(prompts[1].startsWith('ATENÇÃO: uma resposta anterior')).toBe(true);
  });

  test('falls back when the answer stays far longer than the chunk', async () => {
    vi.mocked(LLMCaller.callText).mockResolvedValue(
      answer([TEXT, TEXT, TEXT].join(' ')),
    );

    const result = await createInvoker().refine(chunkOf(TEXT));

    expect(result.usedFallback).toBe(true);
    expect(result.fallbackReason).toBe('content-expansion');
    expect(result.refinedText).toBe(TEXT);
  });

  test('accepts the emphasized retry when it restores the content', async () => {
    vi.mocked(LLMCaller.callText)
      .mockResolvedValueOnce(answer(TEXT.slice(0, 30)))
      .mockImplementationOnce(echo);

    const result = await createInvoker().refine(chunkOf(TEXT));

    expect(result.finalState).toBe('succeeded');
    expect(result.attemptCount).toBe(2);
    expect(result.history.map((state) => state.kind)).toEqual([
      'attempting',
      'degraded',
      'attempting',
      'succeeded',
    ]);
  });

  test('retries failed model calls and then keeps the original text', async () => {
    vi.mocked(LLMCaller.callText).mockRejectedValue(
      new Error('connect ECONNREFUSED 127.0.0.1:11434'),
    );

    const result = await createInvoker({ maxRetries: 2 }).refine(
      chunkOf(TEXT),
    );

    expect(LLMCaller.callText).toHaveBeenCalledTimes(3);
    expect(result).toMatchObject({
      refinedText: TEXT,
      usedFallback: true,
      attemptCount: 3,
      finalState: 'fallen-back',
      fallbackReason: 'model-unavailable',
    });
    expect(result.history).toEqual([
      { kind: 'attempting', attempt: 1, emphasized: false },
      { kind: 'attempting', attempt: 2, emphasized: false },
      { kind: 'attempting', attempt: 3, emphasized: false },
      { kind: 'fallen-back', reason: 'model-unavailable' },
    ]);
  });

  test('recovers when a retried call succeeds', async () => {
    vi.mocked(LLMCaller.callText)
      .mockRejectedValueOnce(new Error('timeout'))
      .mockImplementationOnce(echo);

    const result = await createInvoker().refine(chunkOf(TEXT));

    expect(result.finalState).toBe('succeeded');
    expect(result.attemptCount).toBe(2);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[RefinementInvoker] Model call failed for chunk 1, retrying in 0 ms:',
      new Error('timeout'),
    );
  });

  test('rejects an empty chunk', async () => {
    await expect(createInvoker().refine(chunkOf('  \n '))).rejects.toThrow(
      new ContractViolationError('Chunk 0 is empty'),
    );
    expect(LLMCaller.callText).not.toHaveBeenCalled();
  });

  test('rejects a negative chunk index', async () => {
    await expect(createInvoker().refine(chunkOf(TEXT, -1))).rejects.toThrow(
      'Chunk index must be a non-negative integer, got -1',
    );
  });

  test('rejects thresholds outside their domain', () => {
    expect(() => createInvoker({ minContentRatio: 1.2 })).toThrow(
      new ContractViolationError('minContentRatio must be in (0, 1], got 1.2'),
    );
    expect(() => createInvoker({ maxContentRatio: 0.9 })).toThrow(
      'maxContentRatio must be greater than 1, got 0.9',
    );
    expect(() => createInvoker({ contextWindowTokens: 0 })).toThrow(
      'contextWindowTokens must be a positive integer, got 0',
    );
    expect(() => createInvoker({ maxRetries: -1 })).toThrow(
      'maxRetries must be a non-negative integer, got -1',
    );
  });

  test('refines halves separately when the chunk exceeds the context window', async () => {
    const style = { kind: 'general' as const, needs: [] };
    const classifier: ContentStyleClassifier = { classify: () => style };
    const half = 'Primeira frase sobre o ser.';
    const text = `${half} Segunda frase sobre o nada.`;
    const contextWindowTokens =
      estimateTokens(buildRefinementSystemPrompt(style)) +
      estimateTokens(
        buildRefinementUserPrompt(half, {
          position: 1,
          total: 1,
          emphasized: true,
        }),
      ) +
      estimateTokens(half);
    vi.mocked(LLMCaller.callText).mockImplementation(echo);

    const result = await createInvoker({
      classifier,
      contextWindowTokens,
    }).refine(chunkOf(text));

    expect(result).toMatchObject({
      chunkIndex: 0,
      refinedText: text,
      usedFallback: false,
      attemptCount: 2,
      pieces: 2,
      finalState: 'succeeded',
    });
    const texts = await Promise.all(
      vi
        .mocked(LLMCaller.callText)
        .mock.calls.map(async ([config]) => (await echo(config)).output),
    );
    expect(texts).toEqual([half, 'Segunda frase sobre o nada.']);
  });

  test('serves a repeated chunk from the cache', async () => {
    const cache = new InMemoryRefinementCache();
    vi.mocked(LLMCaller.callText).mockImplementation(echo);
    const invoker = createInvoker({ cache });

    await invoker.refine(chunkOf(TEXT));
    const cached = await invoker.refine(chunkOf(TEXT));

    expect(LLMCaller.callText).toHaveBeenCalledTimes(1);
    expect(cached).toMatchObject({
      refinedText: TEXT,
      attemptCount: 0,
      fromCache: true,
      usedFallback: false,
    });
  });

  test('returns the refined chunk when the cache write fails', async () => {
    const diskFull = Object.assign(new Error('ENOSPC: no space left on device'), {
      code: 'ENOSPC',
    });
    const cache = {
      get: vi.fn().mockReturnValue(undefined),
      set: vi.fn(() => {
        throw diskFull;
      }),
    };
    vi.mocked(LLMCaller.callText).mockImplementation(echo);

    const result = await createInvoker({ cache }).refine(chunkOf(TEXT));

    expect(result).toMatchObject({
      refinedText: TEXT,
      usedFallback: false,
      finalState: 'succeeded',
    });
    expect(cache.set).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[RefinementInvoker] Failed to cache chunk 1:',
      diskFull,
    );
  });

  test('does not cache fallbacks', async () => {
    const cache = new InMemoryRefinementCache();
    vi.mocked(LLMCaller.callText).mockResolvedValue(answer('curto'));

    await createInvoker({ cache }).refine(chunkOf(TEXT));

    expect(cache.size).toBe(0);
  });

  test('forwards streamed deltas with the chunk index', async () => {
    const onTextDelta = vi.fn();
    vi.mocked(LLMCaller.callText).mockImplementation((config) => {
      config.onTextDelta?.('Hoje ');
      return echo(config);
    });

    await createInvoker({ onTextDelta }).refine(chunkOf(TEXT, 4), 5);

    expect(onTextDelta).toHaveBeenCalledWith('Hoje ', 4);
  });

  describe('splitInHalf', () => {
    test('splits a single sentence at the whitespace nearest the middle', () => {
      expect(RefinementInvoker.splitInHalf('alfa beta gama delta')).toEqual({
        left: 'alfa beta',
        separator: ' ',
        right: 'gama delta',
      });
    });

    test('prefers a sentence boundary and keeps the separator', () => {
      expect(RefinementInvoker.splitInHalf('Um. Dois três.\n\nQuatro.')).toEqual(
        {
          left: 'Um. Dois três.',
          separator: '\n\n',
          right: 'Quatro.',
        },
      );
    });

    test('does not split a single word', () => {
      expect(RefinementInvoker.splitInHalf('palavra')).toBeUndefined();
    });
  });
});
