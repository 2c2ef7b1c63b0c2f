export type {
  AppliedCorrection,
  CorrectionEntry,
  CorrectionKind,
  CorrectionOutcome,
  TermSuggestion,
} from './correction-entry';
export type { Chunk, ChunkingMode, SourceOffset } from './chunk';
export type {
  FallbackReason,
  RefinementResult,
  RefinementState,
  RefinementStateKind,
  TerminalRefinementState,
} from './refinement-result';
export type { ProcessingStats, RefinementRun } from './processing-stats';
export type { QualityReport, QualitySummary } from './quality-report';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
