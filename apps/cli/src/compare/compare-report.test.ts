import type { ProcessingStats, RefinementRun } from '@refinaria/model';

import { describe, expect, test } from 'vitest';

import {
  buildComparisonReport,
  formatComparisonReport,
  measureRun,
} from './compare-report';

const ORIGINAL = 'um dois três quatro';

function createRun(text: string, fallbacksTriggered: number): RefinementRun {
  const stats = { fallbacksTriggered } as ProcessingStats;
  return { text, stats, results: [] };
}

describe('measureRun', () => {
  test('measures the output against the original', () => {
    expect(
      measureRun({
        model: 'ollama/a',
        original: ORIGINAL,
        correctedInput: ORIGINAL,
        run: createRun('um dois três', 1),
        elapsedMs: 3000,
      }),
    ).toEqual({
      model: 'ollama/a',
      status: 'ok',
      chars: 12,
      charDiff: -7,
      words: 3,
      wordDiff: -1,
      contentRatio: 12 / 19,
      fallbacks: 1,
      elapsedMs: 3000,
      wordChanges: 1,
    });
  });

  test('counts word changes against the corrected input', () => {
    const measurement = measureRun({
      model: 'ollama/a',
      original: 'a fenomenolojia',
      correctedInput: 'a fenomenologia',
      run: createRun('a fenomenologia', 0),
      elapsedMs: 1,
    });

    expect(measurement.wordChanges).toBe(0);
  });
});

describe('comparison report', () => {
  const models = [
    measureRun({
      model: 'ollama/a',
      original: ORIGINAL,
      correctedInput: ORIGINAL,
      run: createRun('um dois três', 1),
      elapsedMs: 3000,
    }),
    measureRun({
      model: 'ollama/b',
      original: ORIGINAL,
      correctedInput: ORIGINAL,
      run: createRun('um dois três quatro cinco', 0),
      elapsedMs: 6000,
    }),
    {
      model: 'openai/gpt-4o',
      status: 'failed' as const,
      error: 'OPENAI_API_KEY must be set to use openai/gpt-4o',
    },
  ];

  test('ranks only the models that ran', () => {
    const report = buildComparisonReport('aula.txt', ORIGINAL, models);

    expect(report.originalChars).toBe(19);
    expect(report.originalWords).toBe(4);
    expect(report.rankings).toEqual({
      speed: ['ollama/a', 'ollama/b'],
      preservation: ['ollama/b', 'ollama/a'],
      balanced: ['ollama/b', 'ollama/a'],
    });
  });

  test('formats a table followed by the rankings', () => {
    const report = buildComparisonReport('aula.txt', ORIGINAL, models);

    expect(formatComparisonReport(report).split('\n')).toEqual([
      'aula.txt: 19 chars, 4 words',
      '',
      'Model     Chars  Δ chars  Words  Δ words   Ratio  Fallbacks  Time  Word changes',
      '--------  -----  -------  -----  -------  ------  ---------  ----  ------------',
      'ollama/a     12       -7      3       -1   63.2%          1  3.0s             1',
      'ollama/b     25       +6      5       +1  131.6%          0  6.0s             1',
      'openai/gpt-4o  failed: OPENAI_API_KEY must be set to use openai/gpt-4o',
      '',
      'Fastest: ollama/a > ollama/b',
      'Closest to original length: ollama/b > ollama/a',
      'Balanced: ollama/b > ollama/a',
    ]);
  });

  test('omits the rankings when every model failed', () => {
    const report = buildComparisonReport('aula.txt', ORIGINAL, [models[2]]);

    expect(formatComparisonReport(report)).toBe(
      [
        'aula.txt: 19 chars, 4 words',
        '',
        'Model  Chars  Δ chars  Words  Δ words  Ratio  Fallbacks  Time  Word changes',
        '-----  -----  -------  -----  -------  -----  ---------  ----  ------------',
        'openai/gpt-4o  failed: OPENAI_API_KEY must be set to use openai/gpt-4o',
      ].join('\n'),
    );
  });
});
