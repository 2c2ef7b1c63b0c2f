/**
 * @refinaria/refiner
 *
 * Turns raw speech-to-text transcripts of philosophy lectures into clean
 * Brazilian Portuguese text.
 *
 * ## Key Features
 *
 * - Term dictionary with exact and phonetic patterns, case-preserving
 * - Paragraph-aware, word-count and model-assisted chunking
 * - Per-chunk refinement with retry, content-loss guard and safe fallback
 * - Advisory quality report per refined chunk
 * - Pipeline statistics with a global degraded flag
 *
 * @packageDocumentation
 */

export { TranscriptRefiner } from './transcript-refiner';
export type { RefineOptions, RefinementProgress } from './transcript-refiner';
export { BaseLLMComponent, TextLLMComponent } from './core';
export type { BaseLLMComponentOptions } from './core';
export { SmartChunker, TextChunker } from './chunkers';
export type { DeterministicChunkingMode, TextChunkerOptions } from './chunkers';
export {
  InMemoryRefinementCache,
  RefinementInvoker,
  createRefinementCacheKey,
  estimateTokens,
} from './invokers';
export type { RefinementCache, RefinementInvokerOptions } from './invokers';
export {
  TermDictionary,
  correctionEntrySchema,
  correctionTableSchema,
  loadBuiltinCorrectionTable,
  parseCorrectionTable,
  transferCase,
} from './corrections';
export type { SuggestOptions } from './corrections';
export { KeywordContentStyleClassifier } from './classifiers/content-style-classifier';
export type {
  ContentStyle,
  ContentStyleClassifier,
  ContentStyleKind,
  ContextNeed,
} from './classifiers/content-style-classifier';
export {
  buildRefinementSystemPrompt,
  buildRefinementUserPrompt,
} from './prompts/refinement-prompts';
export type { RefinementPromptContext } from './prompts/refinement-prompts';
export { ContractViolationError, CorrectionTableError } from './errors';
export { QualityValidator } from './quality';
export type { QualityThresholds } from './quality';
export { TextCleaner } from './utils/text-cleaner';
export type { TextSpan } from './utils/text-cleaner';
