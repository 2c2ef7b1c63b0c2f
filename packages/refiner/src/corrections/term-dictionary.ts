import type {
  AppliedCorrection,
  CorrectionEntry,
  CorrectionOutcome,
  TermSuggestion,
} from '@refinaria/model';

import { distance } from 'fastest-levenshtein';

import { CorrectionTableError } from '../errors/correction-table-error';
import { TextCleaner } from '../utils/text-cleaner';
import { loadBuiltinCorrectionTable } from './correction-table';

const BEFORE = '(?<![\\p{L}\\p{N}])';
const AFTER = '(?![\\p{L}\\p{N}])';

export interface SuggestOptions {
  /** Minimum similarity (0-1) for a suggestion (default: 0.85) */
  cutoff?: number;
  /** Shorter words are never flagged (default: 6) */
  minLength?: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Regex source for one entry. Whitespace inside an exact phrase matches any
 * whitespace run so phrases broken across lines still match.
 */
function toSource(entry: CorrectionEntry): string {
  if (entry.kind === 'phonetic-pattern') {
    return entry.pattern;
  }
  return entry.pattern.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
}

/**
 * Applies the capitalization of the matched span to the replacement:
 * all caps → all caps, leading capital → leading capital (rest as stored),
 * anything else → lowercase.
 */
export function transferCase(matched: string, replacement: string): string {
  if (matched === matched.toUpperCase() && matched !== matched.toLowerCase()) {
    return replacement.toUpperCase();
  }

  const firstLetter = /\p{L}/u.exec(matched)?.[0];
  if (firstLetter && firstLetter !== firstLetter.toLowerCase()) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }

  return replacement.toLowerCase();
}

/**
 * Priority order: exact entries by descending pattern length, then phonetic
 * patterns in table order. Ties keep table order.
 */
function prioritize(entries: readonly CorrectionEntry[]): CorrectionEntry[] {
  const exact = entries.filter((entry) => entry.kind === 'exact');
  const phonetic = entries.filter((entry) => entry.kind !== 'exact');
  exact.sort((a, b) => b.pattern.length - a.pattern.length);
  return [...exact, ...phonetic];
}

function describePhoneticPattern(entry: CorrectionEntry): string | undefined {
  try {
    new RegExp(entry.pattern, 'iu');
  } catch (error) {
    return `pattern "${entry.pattern}" does not compile: ${CorrectionTableError.getErrorMessage(error)}`;
  }

  const groups = new RegExp(`(?:${entry.pattern})|`, 'u').exec('');
  if (groups && groups.length > 1) {
    return `pattern "${entry.pattern}" declares capture groups`;
  }
  if (new RegExp(`^(?:${entry.pattern})$`, 'iu').test('')) {
    return `pattern "${entry.pattern}" matches the empty string`;
  }
  return undefined;
}

/**
 * TermDictionary - Case-aware, whole-word term corrections
 *
 * Every entry becomes one alternative of a single global regex bounded by
 * letter/digit lookarounds, so one scan applies all corrections and a
 * replacement is never rescanned. At a given position the first
 * alternative in priority order wins, which keeps "tomaz" from firing inside
 * "Tomaz de Aquino".
 *
 * The table is validated when the dictionary is built; `correct` is then
 * pure and idempotent.
 *
 * @example
 * ```typescript
 * const dictionary = TermDictionary.builtin();
 * dictionary.correct('A filizofia de Socratez').corrected;
 * // 'A filosofia de Sócrates'
 * ```
 */
export class TermDictionary {
  private static builtinInstance?: TermDictionary;

  readonly entries: readonly CorrectionEntry[];
  private readonly matcher: RegExp;
  private readonly vocabulary: ReadonlyMap<string, string>;

  /**
   * @throws CorrectionTableError if the table breaks a load-time invariant
   */
  constructor(entries: readonly CorrectionEntry[]) {
    const problems = TermDictionary.findEntryProblems(entries);
    if (problems.length > 0) {
      throw new CorrectionTableError(problems);
    }

    this.entries = Object.freeze(
      prioritize(entries).map((entry) => Object.freeze({ ...entry })),
    );
    this.matcher = new RegExp(
      `${BEFORE}(?:${this.entries.map((entry) => `(${toSource(entry)})`).join('|')})${AFTER}`,
      'giu',
    );

    const replacementProblems = this.findReplacementProblems();
    if (replacementProblems.length > 0) {
      throw new CorrectionTableError(replacementProblems);
    }

    this.vocabulary = new Map(
      this.entries
        .map((entry) => entry.replacement)
        .filter((term) => !/\s/.test(term))
        .map((term) => [TextCleaner.fold(term), term]),
    );
  }

  /**
   * Shared dictionary built from the packaged table on first use
   */
  static builtin(): TermDictionary {
    TermDictionary.builtinInstance ??= new TermDictionary(
      loadBuiltinCorrectionTable(),
    );
    return TermDictionary.builtinInstance;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Replaces every matched term, preserving the span's capitalization.
   */
  correct(text: string): CorrectionOutcome {
    const applied: AppliedCorrection[] = [];
    let corrected = '';
    let cursor = 0;

    for (const match of text.matchAll(this.matcher)) {
      const offset = match.index ?? 0;
      const group = match.findIndex((value, i) => i > 0 && value !== undefined);
      const entry = this.entries[group - 1];
      const replacement = transferCase(match[0], entry.replacement);

      corrected += text.slice(cursor, offset) + replacement;
      cursor = offset + match[0].length;
      applied.push({
        pattern: entry.pattern,
        replacement,
        original: match[0],
        offset,
        kind: entry.kind,
      });
    }

    if (applied.length === 0) {
      return { corrected: text, applied };
    }
    return { corrected: corrected + text.slice(cursor), applied };
  }

  /**
   * Words that look like a known term (accent-insensitive Levenshtein
   * similarity at or above the cutoff) without being one. Nothing is
   * replaced; inflections of a known term (shared prefix) are not flagged.
   */
  suggest(text: string, options: SuggestOptions = {}): TermSuggestion[] {
    const cutoff = options.cutoff ?? 0.85;
    const minLength = options.minLength ?? 6;
    const suggestions: TermSuggestion[] = [];

    for (const match of text.matchAll(/\p{L}+(?:-\p{L}+)*/gu)) {
      const word = match[0];
      if (word.length < minLength) {
        continue;
      }

      const folded = TextCleaner.fold(word);
      const known = this.vocabulary.get(folded);
      if (known !== undefined) {
        if (known.toLowerCase() !== word.toLowerCase()) {
          suggestions.push({
            word,
            suggestion: known,
            similarity: 1,
            offset: match.index ?? 0,
          });
        }
        continue;
      }

      const isInflection = [...this.vocabulary.keys()].some(
        (foldedTerm) =>
          folded.startsWith(foldedTerm) || foldedTerm.startsWith(folded),
      );
      if (isInflection) {
        continue;
      }

      let best: { term: string; similarity: number } | undefined;
      for (const [foldedTerm, term] of this.vocabulary) {
        const similarity =
          1 -
          distance(folded, foldedTerm) /
            Math.max(folded.length, foldedTerm.length);
        if (similarity >= cutoff && (!best || similarity > best.similarity)) {
          best = { term, similarity };
        }
      }

      if (best) {
        suggestions.push({
          word,
          suggestion: best.term,
          similarity: Math.round(best.similarity * 1000) / 1000,
          offset: match.index ?? 0,
        });
      }
    }

    return suggestions;
  }

  private static findEntryProblems(
    entries: readonly CorrectionEntry[],
  ): string[] {
    const problems: string[] = [];
    const seen = new Set<string>();

    for (const entry of entries) {
      if (!entry.pattern.trim() || !entry.replacement.trim()) {
        problems.push(
          `entry "${entry.pattern}" → "${entry.replacement}" is empty`,
        );
        continue;
      }

      const key = `${entry.kind}:${entry.pattern.trim().toLowerCase().split(/\s+/).join(' ')}`;
      if (seen.has(key)) {
        problems.push(`duplicate pattern "${entry.pattern}"`);
      }
      seen.add(key);

      if (entry.kind === 'phonetic-pattern') {
        const problem = describePhoneticPattern(entry);
        if (problem) {
          problems.push(problem);
        }
      }
    }

    return problems;
  }

  /**
   * Idempotence invariants: no replacement may be matched by any pattern,
   * and no multi-word pattern may contain another entry's replacement
   * (otherwise a first pass could produce a phrase a second pass rewrites).
   */
  private findReplacementProblems(): string[] {
    const problems: string[] = [];
    const singleMatcher = new RegExp(this.matcher.source, 'iu');

    for (const entry of this.entries) {
      const hit = singleMatcher.exec(entry.replacement);
      if (hit) {
        problems.push(
          `replacement "${entry.replacement}" (of "${entry.pattern}") is matched again by "${hit[0]}"`,
        );
      }
    }

    const phrases = this.entries.filter(
      (entry) => entry.kind === 'exact' && /\s/.test(entry.pattern.trim()),
    );
    for (const phrase of phrases) {
      for (const other of this.entries) {
        if (other === phrase) {
          continue;
        }
        const contains = new RegExp(
          `${BEFORE}${toSource({ ...other, pattern: other.replacement, kind: 'exact' })}${AFTER}`,
          'iu',
        );
        if (contains.test(phrase.pattern)) {
          problems.push(
            `pattern "${phrase.pattern}" contains "${other.replacement}", the replacement of "${other.pattern}"`,
          );
        }
      }
    }

    return problems;
  }
}
