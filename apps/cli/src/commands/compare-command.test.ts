import type { RefinementRun } from '@refinaria/model';
import type { LanguageModel } from 'ai';

import { TermDictionary } from '@refinaria/refiner';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import type { CommandContext } from './command-context';

import { DEFAULT_CONFIG } from '../config/refinaria-config';
import { ConfigError } from '../errors/config-error';
import { readTranscript, writeTranscript } from '../io/transcript-files';
import {
  compareModels,
  comparisonOutputPath,
  runCompareCommand,
} from './compare-command';

const processMock = vi.hoisted(() =>
  vi.fn<(text: string, model: { modelId: string }) => Promise<RefinementRun>>(),
);

vi.mock('@refinaria/refiner', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@refinaria/refiner')>();
  return {
    ...actual,
    TranscriptRefiner: class {
      process = processMock;
    },
  };
});

vi.mock('../io/transcript-files', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../io/transcript-files')>();
  return {
    ...actual,
    readTranscript: vi.fn(),
    writeTranscript: vi.fn(),
  };
});

const OUTPUTS: Record<string, string> = {
  'ollama/a': 'um dois três',
  'ollama/b': 'um dois três quatro cinco',
};

describe('compareModels', () => {
  const mockLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  const stdout = { write: vi.fn() };
  const checkModel = vi.fn<CommandContext['checkModel']>();

  function createContext(abortSignal?: AbortSignal): CommandContext {
    return {
      logger: mockLogger,
      config: { ...DEFAULT_CONFIG, output: 'out' },
      stdout,
      stderr: { write: vi.fn() },
      createModel: (modelId) => {
        if (modelId.startsWith('openai/')) {
          throw new ConfigError(`OPENAI_API_KEY must be set to use ${modelId}`);
        }
        return { modelId } as unknown as LanguageModel;
      },
      checkModel,
      dictionary: TermDictionary.builtin(),
      abortSignal,
    };
  }

  beforeEach(() => {
    vi.mocked(readTranscript).mockResolvedValue({
      text: 'um dois três quatro',
      bom: false,
    });
    vi.mocked(writeTranscript).mockResolvedValue(undefined);
    checkModel.mockResolvedValue(undefined);
    processMock.mockImplementation(async (_text, model) => ({
      text: OUTPUTS[model.modelId],
      stats: {
        fallbacksTriggered: model.modelId === 'ollama/a' ? 1 : 0,
      } as RefinementRun['stats'],
      results: [],
    }));
  });

  test('measures each model on the same transcript', async () => {
    const report = await compareModels(createContext(), 'in/aula.txt', [
      'ollama/a',
      'ollama/b',
    ]);

    expect(processMock).toHaveBeenCalledTimes(2);
    expect(processMock.mock.calls[1][0]).toBe('um dois três quatro');
    expect(report.models).toEqual([
      expect.objectContaining({
        model: 'ollama/a',
        status: 'ok',
        chars: 12,
        fallbacks: 1,
        wordChanges: 1,
      }),
      expect.objectContaining({
        model: 'ollama/b',
        status: 'ok',
        chars: 25,
        fallbacks: 0,
      }),
    ]);
    expect(report.rankings.preservation).toEqual(['ollama/b', 'ollama/a']);
    expect(writeTranscript).not.toHaveBeenCalled();
  });

  test('reports a failing model and runs the next one', async () => {
    const report = await compareModels(createContext(), 'in/aula.txt', [
      'openai/gpt-4o',
      'ollama/b',
    ]);

    expect(report.models[0]).toEqual({
      model: 'openai/gpt-4o',
      status: 'failed',
      error: 'OPENAI_API_KEY must be set to use openai/gpt-4o',
    });
    expect(report.models[1].status).toBe('ok');
    expect(report.rankings.speed).toEqual(['ollama/b']);
  });

  test('checks each model before running it', async () => {
    checkModel.mockImplementation(async (_model, modelId) => {
      if (modelId === 'ollama/a') {
        throw new ConfigError(
          "Model ollama/a is not available: model 'a' not found",
        );
      }
    });

    const report = await compareModels(createContext(), 'in/aula.txt', [
      'ollama/a',
      'ollama/b',
    ]);

    expect(checkModel.mock.calls.map((call) => call[1])).toEqual([
      'ollama/a',
      'ollama/b',
    ]);
    expect(processMock).toHaveBeenCalledTimes(1);
    expect(report.models[0]).toEqual({
      model: 'ollama/a',
      status: 'failed',
      error: "Model ollama/a is not available: model 'a' not found",
    });
    expect(report.models[1].status).toBe('ok');
  });

  test('writes each output under a model-specific name', async () => {
    const report = await compareModels(
      createContext(),
      'in/aula.txt',
      ['ollama/a'],
      { write: true },
    );

    expect(writeTranscript).toHaveBeenCalledWith('out/refined_ollama_a_aula.txt', {
      text: 'um dois três',
      bom: false,
    });
    expect(report.models[0]).toMatchObject({
      outputPath: 'out/refined_ollama_a_aula.txt',
    });
  });

  test('stops before the next model once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await compareModels(
      createContext(controller.signal),
      'in/aula.txt',
      ['ollama/a', 'ollama/b'],
    );

    expect(report.models).toEqual([]);
    expect(processMock).not.toHaveBeenCalled();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      'Comparison cancelled before ollama/a',
    );
  });

  test('exits non-zero when a model failed', async () => {
    await expect(
      runCompareCommand(createContext(), 'in/aula.txt', ['openai/gpt-4o']),
    ).resolves.toBe(1);
    expect(stdout.write).toHaveBeenCalledTimes(1);
  });
});

describe('comparisonOutputPath', () => {
  test('flattens provider and tag separators', () => {
    expect(
      comparisonOutputPath('out', 'ollama/llama3.2:latest', 'input/aula.txt'),
    ).toBe('out/refined_ollama_llama3.2_latest_aula.txt');
  });
});
