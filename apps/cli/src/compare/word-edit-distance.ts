import { distance } from 'fastest-levenshtein';

const FIRST_CODE_POINT = 0x100;
const SURROGATE_START = 0xd800;
const SURROGATE_END = 0xdfff;

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Word-level Levenshtein distance: insertions, deletions and substitutions of
 * whole words needed to turn `source` into `target`.
 *
 * Each distinct word is mapped to one UTF-16 code unit so the character-level
 * distance of the encoded strings is the word-level distance.
 */
export function wordEditDistance(source: string, target: string): number {
  const codes = new Map<string, string>();

  const encode = (text: string): string =>
    splitWords(text)
      .map((word) => {
        let code = codes.get(word);
        if (code === undefined) {
          code = String.fromCharCode(toCodeUnit(codes.size));
          codes.set(word, code);
        }
        return code;
      })
      .join('');

  return distance(encode(source), encode(target));
}

function toCodeUnit(index: number): number {
  const unit = FIRST_CODE_POINT + index;
  if (unit < SURROGATE_START) {
    return unit;
  }
  const shifted = unit + (SURROGATE_END - SURROGATE_START + 1);
  if (shifted > 0xffff) {
    throw new RangeError('Too many distinct words to compare');
  }
  return shifted;
}
