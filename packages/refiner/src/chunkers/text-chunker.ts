import type { Chunk } from '@refinaria/model';

import { ContractViolationError } from '../errors/contract-violation-error';
import { type TextSpan, TextCleaner } from '../utils/text-cleaner';

export type DeterministicChunkingMode = 'paragraph-aware' | 'word-count';

export interface TextChunkerOptions {
  /**
   * Words scanned past the target size for a sentence end before breaking
   * mid-sentence (default: 50)
   */
  sentenceLookahead?: number;

  /**
   * Text with no blank-line break is chunked by word count once it exceeds
   * this multiple of the target size (default: 4)
   */
  unbrokenLimitFactor?: number;
}

/**
 * TextChunker - Splits a transcript into ordered, size-bounded chunks
 *
 * Chunks never carry leading or trailing whitespace; the whitespace between
 * two chunks belongs to neither. `reassemble` puts it back, so
 * `reassemble(text, chunks, chunks.map((c) => c.text)) === text`.
 *
 * - `word-count`: greedy by words, ending at the first sentence terminator
 *   at or after the target (bounded look-ahead)
 * - `paragraph-aware`: packs whole paragraphs up to the target; a paragraph
 *   longer than the target stays a chunk of its own
 */
export class TextChunker {
  private readonly sentenceLookahead: number;
  private readonly unbrokenLimitFactor: number;

  constructor(options: TextChunkerOptions = {}) {
    this.sentenceLookahead = options.sentenceLookahead ?? 50;
    this.unbrokenLimitFactor = options.unbrokenLimitFactor ?? 4;
  }

  chunk(
    text: string,
    targetSize: number,
    mode: DeterministicChunkingMode,
  ): Chunk[] {
    TextChunker.assertTargetSize(targetSize);

    if (mode === 'word-count') {
      return this.chunkByWordCount(text, targetSize);
    }

    const paragraphs = TextChunker.findParagraphs(text);
    if (
      paragraphs.length === 1 &&
      TextChunker.countSpanWords(text, paragraphs[0]) >
        targetSize * this.unbrokenLimitFactor
    ) {
      return this.chunkByWordCount(text, targetSize);
    }
    return TextChunker.pack(text, paragraphs, targetSize);
  }

  /**
   * Whether a segment is too long to be kept whole when it is the only
   * structure the text has
   */
  exceedsUnbrokenLimit(wordCount: number, targetSize: number): boolean {
    return wordCount > targetSize * this.unbrokenLimitFactor;
  }

  /**
   * Greedy word-count split with sentence-end look-ahead
   */
  chunkByWordCount(text: string, targetSize: number): Chunk[] {
    TextChunker.assertTargetSize(targetSize);

    const words = TextCleaner.findWords(text);
    const spans: TextSpan[] = [];
    let first = 0;

    while (first < words.length) {
      let last = first + targetSize - 1;

      if (last >= words.length - 1) {
        last = words.length - 1;
      } else {
        const limit = Math.min(last + this.sentenceLookahead, words.length - 1);
        for (let index = last; index <= limit; index++) {
          if (
            TextCleaner.endsSentence(
              text.slice(words[index].start, words[index].end),
            )
          ) {
            last = index;
            break;
          }
        }
      }

      spans.push({ start: words[first].start, end: words[last].end });
      first = last + 1;
    }

    return spans.map((span, index) => TextChunker.toChunk(text, span, index));
  }

  /**
   * Paragraph spans; paragraphs are separated by blank lines
   */
  static findParagraphs(text: string): TextSpan[] {
    const paragraphs: TextSpan[] = [];
    let current: TextSpan | undefined;

    for (const word of TextCleaner.findWords(text)) {
      if (current && /\n[^\S\n]*\n/.test(text.slice(current.end, word.start))) {
        paragraphs.push(current);
        current = undefined;
      }
      if (current) {
        current.end = word.end;
      } else {
        current = { start: word.start, end: word.end };
      }
    }

    if (current) {
      paragraphs.push(current);
    }
    return paragraphs;
  }

  /**
   * Packs consecutive segments into chunks of at most `targetSize` words.
   * A segment is never split; one larger than the target becomes its own
   * chunk.
   */
  static pack(
    text: string,
    segments: readonly TextSpan[],
    targetSize: number,
  ): Chunk[] {
    const spans: TextSpan[] = [];
    let current: TextSpan | undefined;
    let currentWords = 0;

    for (const segment of segments) {
      const words = TextChunker.countSpanWords(text, segment);

      if (current && currentWords + words > targetSize) {
        spans.push(current);
        current = undefined;
        currentWords = 0;
      }

      current = current
        ? { start: current.start, end: segment.end }
        : { ...segment };
      currentWords += words;
    }

    if (current) {
      spans.push(current);
    }
    return spans.map((span, index) => TextChunker.toChunk(text, span, index));
  }

  /**
   * Rebuilds the source with each chunk's text replaced, keeping the
   * original whitespace before, between and after chunks. Only the first
   * `texts.length` chunks are used; the text ends after the last of them.
   */
  static reassemble(
    source: string,
    chunks: readonly Chunk[],
    texts: readonly string[],
  ): string {
    if (chunks.length === 0) {
      return source;
    }

    const count = Math.min(chunks.length, texts.length);
    let output = source.slice(0, chunks[0].sourceOffset.start);

    for (let index = 0; index < count; index++) {
      if (index > 0) {
        output += source.slice(
          chunks[index - 1].sourceOffset.end,
          chunks[index].sourceOffset.start,
        );
      }
      output += texts[index];
    }

    if (count === chunks.length) {
      output += source.slice(chunks[chunks.length - 1].sourceOffset.end);
    }
    return output;
  }

  private static countSpanWords(text: string, span: TextSpan): number {
    return TextCleaner.countWords(text.slice(span.start, span.end));
  }

  private static toChunk(text: string, span: TextSpan, index: number): Chunk {
    const chunkText = text.slice(span.start, span.end);
    return {
      index,
      text: chunkText,
      wordCount: TextCleaner.countWords(chunkText),
      sourceOffset: { start: span.start, end: span.end },
    };
  }

  private static assertTargetSize(targetSize: number): void {
    ContractViolationError.assert(
      Number.isInteger(targetSize) && targetSize > 0,
      `Target size must be a positive integer, got ${targetSize}`,
    );
  }
}
