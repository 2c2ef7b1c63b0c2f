export type ChunkingMode = 'paragraph-aware' | 'word-count' | 'smart';

/**
 * Half-open character range `[start, end)` in the chunked text
 */
export interface SourceOffset {
  start: number;
  end: number;
}

/**
 * An ordered segment of a transcript refined as one unit.
 *
 * `text` is always `source.slice(sourceOffset.start, sourceOffset.end)`; the
 * whitespace between two chunks belongs to neither and is restored verbatim
 * on reassembly.
 */
export interface Chunk {
  index: number;
  text: string;
  wordCount: number;
  sourceOffset: SourceOffset;
}
