/**
 * Advisory checks of one refined chunk against its source text.
 * Warnings never change the refined text or the chunk's final state.
 */
export interface QualityReport {
  /** `1 - editDistance / longerLength`, over characters */
  similarity: number;
  /** Share of the source's distinct words found in the refined text */
  wordRetention: number;
  /** Mean preservation of argument markers, Latin expressions and paragraphs */
  structurePreservation: number;
  citationsBefore: number;
  citationsAfter: number;
  warnings: string[];
}

export interface QualitySummary {
  /** Chunks whose model answer was checked (fallbacks are not) */
  chunksChecked: number;
  chunksWithWarnings: number;
  warnings: number;
  /** 1 when no chunk was checked */
  meanSimilarity: number;
  /** 1 when no chunk was checked */
  meanWordRetention: number;
}
