import type { QualityReport } from './quality-report';

/**
 * States a chunk moves through while it is being refined.
 *
 * `attempting` and `degraded` are transient; every chunk ends in
 * `succeeded` or `fallen-back`.
 */
export type RefinementState =
  | { kind: 'attempting'; attempt: number; emphasized: boolean }
  | { kind: 'degraded'; contentRatio: number }
  | { kind: 'succeeded'; contentRatio: number }
  | { kind: 'fallen-back'; reason: FallbackReason };

export type RefinementStateKind = RefinementState['kind'];

export type TerminalRefinementState = Extract<
  RefinementStateKind,
  'succeeded' | 'fallen-back'
>;

/**
 * Why the original chunk text was kept
 *
 * - `model-unavailable`: every model call failed (transport, timeout)
 * - `content-loss`: the answer stayed too short after the emphasized retry
 * - `content-expansion`: the answer stayed too long after the emphasized retry
 */
export type FallbackReason =
  | 'model-unavailable'
  | 'content-loss'
  | 'content-expansion';

export interface RefinementResult {
  chunkIndex: number;
  refinedText: string;
  usedFallback: boolean;
  /** Model calls made for this chunk, including its halves when it was split */
  attemptCount: number;
  /** `refinedText.length / original.length` */
  contentRatio: number;
  finalState: TerminalRefinementState;
  fallbackReason?: FallbackReason;
  fromCache: boolean;
  /** Number of pieces the chunk was split into to fit the context window */
  pieces: number;
  /** Every state visited, in order */
  history: RefinementState[];
  /** Absent on fallbacks, which keep the source text */
  quality?: QualityReport;
}
