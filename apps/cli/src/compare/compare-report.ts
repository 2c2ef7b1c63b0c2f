import type { RefinementRun } from '@refinaria/model';

import { splitWords, wordEditDistance } from './word-edit-distance';

export interface ModelMeasurement {
  model: string;
  status: 'ok';
  chars: number;
  /** `chars` minus the original length */
  charDiff: number;
  words: number;
  wordDiff: number;
  /** Output length over the original length */
  contentRatio: number;
  fallbacks: number;
  elapsedMs: number;
  /** Word edits between the dictionary-corrected input and the output */
  wordChanges: number;
  /** Where the output was written, when it was */
  outputPath?: string;
}

export interface FailedModel {
  model: string;
  status: 'failed';
  error: string;
}

export type ModelComparison = ModelMeasurement | FailedModel;

export interface ComparisonReport {
  file: string;
  originalChars: number;
  originalWords: number;
  models: ModelComparison[];
  rankings: {
    /** Shortest elapsed time first */
    speed: string[];
    /** Smallest absolute character difference first */
    preservation: string[];
    /** Lowest `|charDiff| / originalChars + minutes` first */
    balanced: string[];
  };
}

export interface MeasureInput {
  model: string;
  original: string;
  /** The input after the dictionary pass, the baseline for `wordChanges` */
  correctedInput: string;
  run: RefinementRun;
  elapsedMs: number;
}

export function measureRun({
  model,
  original,
  correctedInput,
  run,
  elapsedMs,
}: MeasureInput): ModelMeasurement {
  const chars = run.text.length;
  const words = splitWords(run.text).length;

  return {
    model,
    status: 'ok',
    chars,
    charDiff: chars - original.length,
    words,
    wordDiff: words - splitWords(original).length,
    contentRatio: original.length === 0 ? 1 : chars / original.length,
    fallbacks: run.stats.fallbacksTriggered,
    elapsedMs,
    wordChanges: wordEditDistance(correctedInput, run.text),
  };
}

export function balancedScore(
  measurement: ModelMeasurement,
  originalChars: number,
): number {
  const preservation =
    originalChars === 0 ? 0 : Math.abs(measurement.charDiff) / originalChars;
  return preservation + measurement.elapsedMs / 60_000;
}

export function buildComparisonReport(
  file: string,
  original: string,
  models: ModelComparison[],
): ComparisonReport {
  const measured = models.filter(
    (entry): entry is ModelMeasurement => entry.status === 'ok',
  );
  const rank = (score: (entry: ModelMeasurement) => number): string[] =>
    [...measured]
      .sort((a, b) => score(a) - score(b))
      .map((entry) => entry.model);

  return {
    file,
    originalChars: original.length,
    originalWords: splitWords(original).length,
    models,
    rankings: {
      speed: rank((entry) => entry.elapsedMs),
      preservation: rank((entry) => Math.abs(entry.charDiff)),
      balanced: rank((entry) => balancedScore(entry, original.length)),
    },
  };
}

const HEADERS = [
  'Model',
  'Chars',
  'Δ chars',
  'Words',
  'Δ words',
  'Ratio',
  'Fallbacks',
  'Time',
  'Word changes',
];

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

function toRow(entry: ModelComparison): string[] {
  if (entry.status === 'failed') {
    return [entry.model, `failed: ${entry.error}`];
  }
  return [
    entry.model,
    String(entry.chars),
    signed(entry.charDiff),
    String(entry.words),
    signed(entry.wordDiff),
    `${(entry.contentRatio * 100).toFixed(1)}%`,
    String(entry.fallbacks),
    `${(entry.elapsedMs / 1000).toFixed(1)}s`,
    String(entry.wordChanges),
  ];
}

/**
 * Plain-text table followed by the three rankings
 */
export function formatComparisonReport(report: ComparisonReport): string {
  const rows = report.models.map(toRow);
  const widths = HEADERS.map((header, column) =>
    Math.max(
      header.length,
      ...rows
        .filter((row) => row.length === HEADERS.length)
        .map((row) => row[column].length),
    ),
  );
  const formatRow = (cells: string[]): string =>
    cells.length < HEADERS.length
      ? cells.join('  ')
      : cells
          .map((cell, column) =>
            column === 0
              ? cell.padEnd(widths[column])
              : cell.padStart(widths[column]),
          )
          .join('  ');

  const lines = [
    `${report.file}: ${report.originalChars} chars, ${report.originalWords} words`,
    '',
    formatRow(HEADERS),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...rows.map(formatRow),
  ];

  if (report.rankings.speed.length > 0) {
    lines.push(
      '',
      `Fastest: ${report.rankings.speed.join(' > ')}`,
      `Closest to original length: ${report.rankings.preservation.join(' > ')}`,
      `Balanced: ${report.rankings.balanced.join(' > ')}`,
    );
  }

  return lines.join('\n');
}
