import type { QualityReport, QualitySummary } from '@refinaria/model';

import { distance } from 'fastest-levenshtein';

import { TextCleaner } from '../utils/text-cleaner';

export interface QualityThresholds {
  /** Warn below this character similarity (default: 0.85) */
  minSimilarity: number;
  /** Warn below this share of retained words (default: 0.9) */
  minWordRetention: number;
  /**
   * A changed citation more similar than this to a source citation is
   * reported as altered instead of missing (default: 0.8)
   */
  citationSimilarity: number;
}

const DEFAULT_THRESHOLDS: QualityThresholds = {
  minSimilarity: 0.85,
  minWordRetention: 0.9,
  citationSimilarity: 0.8,
};

const ARGUMENT_MARKERS = [
  'primeiro',
  'segundo',
  'terceiro',
  'por um lado',
  'por outro lado',
  'além disso',
  'ademais',
  'outrossim',
  'portanto',
  'logo',
  'assim',
  'consequentemente',
  'no entanto',
  'porém',
  'contudo',
  'todavia',
];

const LATIN_EXPRESSIONS = [
  'a priori',
  'a posteriori',
  'ad hominem',
  'per se',
  'ipso facto',
  'sine qua non',
  'mutatis mutandis',
];

// "(Kant, 1781)", "[Aristóteles, Met. 1028a, 1990]"
const CITATION = /\([^)]*\d{4}[^)]*\)|\[[^\]]*\d{4}[^\]]*\]/g;

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function similarity(a: string, b: string): number {
  const longer = Math.max(a.length, b.length);
  return longer === 0 ? 1 : 1 - distance(a, b) / longer;
}

function presentMarkers(folded: string, markers: readonly string[]): string[] {
  return markers.filter((marker) =>
    new RegExp(
      `(?<![\\p{L}\\p{N}])${TextCleaner.fold(marker).replace(/ /g, '\\s+')}(?![\\p{L}\\p{N}])`,
      'u',
    ).test(folded),
  );
}

function countParagraphs(text: string): number {
  return text.split(/\n[^\S\n]*\r?\n/).filter((part) => part.trim()).length;
}

function distinctWords(folded: string): Set<string> {
  return new Set(folded.match(/[\p{L}\p{N}]+/gu) ?? []);
}

/**
 * QualityValidator
 *
 * Compares a refined chunk with its source: character similarity, word
 * retention, argument markers, Latin expressions, paragraph count and
 * citations. Words and markers are compared accent-folded, so accent fixes
 * do not count as changes.
 */
export class QualityValidator {
  private readonly thresholds: QualityThresholds;

  constructor(thresholds: Partial<QualityThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
  }

  validate(source: string, refined: string): QualityReport {
    const warnings: string[] = [];
    const foldedSource = TextCleaner.fold(source);
    const foldedRefined = TextCleaner.fold(refined);

    const textSimilarity = similarity(source, refined);
    if (textSimilarity < this.thresholds.minSimilarity) {
      warnings.push(
        `Similarity ${percent(textSimilarity)} is below ${percent(this.thresholds.minSimilarity)}`,
      );
    }

    const wordRetention = this.wordRetention(foldedSource, foldedRefined);
    if (wordRetention < this.thresholds.minWordRetention) {
      warnings.push(
        `Word retention ${percent(wordRetention)} is below ${percent(this.thresholds.minWordRetention)}`,
      );
    }

    const scores: number[] = [];
    for (const [label, markers] of [
      ['Argument markers', ARGUMENT_MARKERS],
      ['Latin expressions', LATIN_EXPRESSIONS],
    ] as const) {
      const before = presentMarkers(foldedSource, markers);
      if (before.length === 0) continue;

      const after = new Set(presentMarkers(foldedRefined, markers));
      const dropped = before.filter((marker) => !after.has(marker));
      scores.push((before.length - dropped.length) / before.length);
      if (dropped.length > 0) {
        warnings.push(`${label} dropped: ${dropped.join(', ')}`);
      }
    }

    const paragraphsBefore = countParagraphs(source);
    const paragraphsAfter = countParagraphs(refined);
    if (paragraphsBefore > 0) {
      scores.push(Math.min(paragraphsAfter / paragraphsBefore, 1));
    }
    if (paragraphsAfter < paragraphsBefore) {
      warnings.push(
        `Paragraphs reduced from ${paragraphsBefore} to ${paragraphsAfter}`,
      );
    }

    const citationsBefore = source.match(CITATION) ?? [];
    const citationsAfter = refined.match(CITATION) ?? [];
    warnings.push(
      ...this.checkCitations(citationsBefore, citationsAfter, refined),
    );

    return {
      similarity: textSimilarity,
      wordRetention,
      structurePreservation:
        scores.length === 0
          ? 1
          : scores.reduce((sum, score) => sum + score, 0) / scores.length,
      citationsBefore: citationsBefore.length,
      citationsAfter: citationsAfter.length,
      warnings,
    };
  }

  /**
   * Totals over the chunks that carry a report
   */
  static summarize(
    reports: readonly (QualityReport | undefined)[],
  ): QualitySummary {
    const checked = reports.filter(
      (report): report is QualityReport => report !== undefined,
    );
    const mean = (values: number[]) =>
      values.length === 0
        ? 1
        : values.reduce((sum, value) => sum + value, 0) / values.length;

    return {
      chunksChecked: checked.length,
      chunksWithWarnings: checked.filter((report) => report.warnings.length > 0)
        .length,
      warnings: checked.reduce(
        (sum, report) => sum + report.warnings.length,
        0,
      ),
      meanSimilarity: mean(checked.map((report) => report.similarity)),
      meanWordRetention: mean(checked.map((report) => report.wordRetention)),
    };
  }

  private wordRetention(foldedSource: string, foldedRefined: string): number {
    const before = distinctWords(foldedSource);
    if (before.size === 0) return 1;

    const after = distinctWords(foldedRefined);
    let retained = 0;
    for (const word of before) {
      if (after.has(word)) retained++;
    }
    return retained / before.size;
  }

  private checkCitations(
    before: readonly string[],
    after: readonly string[],
    refined: string,
  ): string[] {
    const warnings: string[] = [];
    if (before.length !== after.length) {
      warnings.push(
        `Citation count changed from ${before.length} to ${after.length}`,
      );
    }

    for (const citation of before) {
      if (refined.includes(citation)) continue;

      const altered = after.find(
        (candidate) =>
          similarity(citation, candidate) > this.thresholds.citationSimilarity,
      );
      warnings.push(
        altered
          ? `Citation altered: ${citation} → ${altered}`
          : `Citation missing: ${citation}`,
      );
    }
    return warnings;
  }
}
