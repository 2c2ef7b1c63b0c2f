import type { TermSuggestion } from './correction-entry';
import type { QualitySummary } from './quality-report';
import type { RefinementResult } from './refinement-result';
import type { TokenUsageReport } from './token-usage-report';

export interface ProcessingStats {
  chunksTotal: number;
  chunksProcessed: number;
  /** Sum of both dictionary passes */
  correctionsApplied: number;
  correctionsBeforeRefinement: number;
  correctionsAfterRefinement: number;
  fallbacksTriggered: number;
  modelAttempts: number;
  cacheHits: number;
  /** Characters of the processed chunks before refinement */
  inputChars: number;
  /** Characters of the processed chunks after refinement and correction */
  outputChars: number;
  contentRatio: number;
  /** Output fell below the global loss threshold */
  degraded: boolean;
  /** The run was cancelled before every chunk was refined */
  incomplete: boolean;
  elapsedMs: number;
  quality: QualitySummary;
  suggestions: TermSuggestion[];
  tokenUsage: TokenUsageReport;
}

/**
 * Output of one pipeline run
 */
export interface RefinementRun {
  text: string;
  stats: Readonly<ProcessingStats>;
  results: RefinementResult[];
}
