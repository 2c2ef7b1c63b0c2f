/**
 * How a correction pattern is matched.
 *
 * - `exact`: literal word or phrase; whitespace inside a phrase matches any run
 *   of whitespace
 * - `phonetic-pattern`: regular expression source covering a family of
 *   phonetic misspellings (no capture groups)
 */
export type CorrectionKind = 'exact' | 'phonetic-pattern';

/**
 * One misspelled → correct mapping of the term dictionary
 */
export interface CorrectionEntry {
  readonly pattern: string;
  readonly replacement: string;
  readonly kind: CorrectionKind;
}

/**
 * A correction applied to a concrete span of text
 */
export interface AppliedCorrection {
  /** Pattern of the entry that matched */
  pattern: string;
  /** Text inserted, after case transfer */
  replacement: string;
  /** Text that was replaced */
  original: string;
  /** Offset of `original` in the input text */
  offset: number;
  kind: CorrectionKind;
}

export interface CorrectionOutcome {
  corrected: string;
  applied: AppliedCorrection[];
}

/**
 * A word that looks like a known term but was not corrected
 */
export interface TermSuggestion {
  word: string;
  suggestion: string;
  /** 1 - levenshtein distance / longer length, computed without accents */
  similarity: number;
  offset: number;
}
