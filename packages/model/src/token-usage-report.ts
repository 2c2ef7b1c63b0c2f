/**
 * Token usage report types for a refinement run
 *
 * Breaks LLM token consumption down by component, phase and model type
 * (primary vs fallback).
 */

/**
 * Token usage report for one refinement run
 */
export interface TokenUsageReport {
  /**
   * Components in the order their first LLM call was tracked
   */
  components: ComponentUsageReport[];

  /**
   * Grand total across all components and phases
   */
  total: TokenUsageSummary;
}

/**
 * Token usage for a specific component
 *
 * Examples: 'RefinementInvoker', 'SmartChunker'
 */
export interface ComponentUsageReport {
  component: string;
  phases: PhaseUsageReport[];
  total: TokenUsageSummary;
}

/**
 * Token usage for a specific phase, e.g. 'refinement' or 'segmentation'.
 *
 * A phase may use both primary and fallback models when the primary fails.
 */
export interface PhaseUsageReport {
  phase: string;
  primary?: ModelUsageDetail;
  fallback?: ModelUsageDetail;
  total: TokenUsageSummary;
}

export interface ModelUsageDetail extends TokenUsageSummary {
  modelName: string;
}

export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}
