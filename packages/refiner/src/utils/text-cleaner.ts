/**
 * Character range of a word or sentence in a text
 */
export interface TextSpan {
  start: number;
  end: number;
}

const SENTENCE_END = /[.!?…]["'”’»)\]]*$/;

const RESPONSE_LABEL =
  /^(?:(?:aqui est[aá] )?(?:o |a )?(?:texto|transcri[cç][aã]o|vers[aã]o)\s+(?:corrigid[oa]|refinad[oa]|revisad[oa])|here is[^\n]*?)\s*:[ \t]*\r?\n/i;

/**
 * TextCleaner - Word, sentence and model-response helpers
 *
 * - Word counting and word spans (whitespace-delimited tokens)
 * - Sentence spans and sentence-terminator detection
 * - Cleanup of model answers
 * - Optional input normalization (line endings, spacing, hyphenated line breaks)
 */
export class TextCleaner {
  /**
   * Counts whitespace-delimited tokens
   */
  static countWords(text: string): number {
    return text.match(/\S+/g)?.length ?? 0;
  }

  /**
   * Spans of every whitespace-delimited token, in order
   */
  static findWords(text: string): TextSpan[] {
    return Array.from(text.matchAll(/\S+/g), (match) => {
      const start = match.index ?? 0;
      return { start, end: start + match[0].length };
    });
  }

  /**
   * Whether a token closes a sentence (`.`, `!`, `?`, `…`, optionally
   * followed by closing quotes or brackets)
   */
  static endsSentence(token: string): boolean {
    return SENTENCE_END.test(token);
  }

  /**
   * Spans of sentences; a sentence ends at a terminator token or at a blank
   * line. Spans carry no surrounding whitespace.
   */
  static findSentences(text: string): TextSpan[] {
    const sentences: TextSpan[] = [];
    let start = -1;
    let end = -1;

    for (const word of this.findWords(text)) {
      if (start !== -1 && /\n[^\S\n]*\n/.test(text.slice(end, word.start))) {
        sentences.push({ start, end });
        start = -1;
      }
      if (start === -1) {
        start = word.start;
      }
      end = word.end;
      if (this.endsSentence(text.slice(word.start, word.end))) {
        sentences.push({ start, end });
        start = -1;
      }
    }

    if (start !== -1) {
      sentences.push({ start, end });
    }
    return sentences;
  }

  /**
   * Strips what models wrap around the refined text: a fenced code block,
   * a leading "Texto corrigido:" style label and surrounding whitespace.
   */
  static cleanResponse(text: string): string {
    let cleaned = text.trim();

    const fenced = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/.exec(cleaned);
    if (fenced) {
      cleaned = fenced[1].trim();
    }

    return cleaned.replace(RESPONSE_LABEL, '').trim();
  }

  /**
   * Normalizes raw transcript text before correction
   * - CRLF/CR line endings become LF
   * - Non-breaking and other special spaces become regular spaces
   * - Runs of spaces/tabs collapse to one space, trailing spaces are removed
   * - Words hyphenated across a line break are joined
   */
  static normalize(text: string): string {
    if (!text) return '';

    return text
      .normalize('NFC')
      .replace(/\r\n?/g, '\n')
      .replace(/[\u00A0\u2000-\u200A\u202F]/g, ' ')
      .replace(/(\p{L})-\n(\p{Ll})/gu, '$1$2')
      .replace(/[ \t]+/g, ' ')
      .replace(/ +\n/g, '\n');
  }

  /**
   * Removes diacritics (á → a, ç → c) and lowercases
   */
  static fold(text: string): string {
    return text.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
  }
}
