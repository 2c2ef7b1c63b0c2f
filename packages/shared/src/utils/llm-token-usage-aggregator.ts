import type { LoggerMethods } from '@refinaria/logger';
import type {
  ComponentUsageReport,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@refinaria/model';

import type { ExtendedTokenUsage } from './llm-caller';

export type TokenUsage = TokenUsageSummary;

function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addUsage(target: TokenUsage, usage: TokenUsage): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

/**
 * Format token usage as a human-readable string
 *
 * @returns Formatted string like "1500 input, 300 output, 1800 total"
 */
function formatTokens(usage: TokenUsage): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all LLM calls of a run
 *
 * Tracks usage by component (RefinementInvoker, SmartChunker), by phase
 * (refinement, segmentation) and by model (primary vs fallback), and logs a
 * summary once the run is over.
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'RefinementInvoker',
 *   phase: 'refinement',
 *   model: 'primary',
 *   modelName: 'llama3.2:latest',
 *   inputTokens: 1500,
 *   outputTokens: 1300,
 *   totalTokens: 2800,
 * });
 *
 * aggregator.logSummary(logger);
 * // [TranscriptRefiner] Token usage summary:
 * // RefinementInvoker:
 * //   - refinement (primary: llama3.2:latest): 1500 input, 1300 output, 2800 total
 * // Grand total: 1500 input, 1300 output, 2800 total
 * ```
 */
export class LLMTokenUsageAggregator {
  private components = new Map<string, Map<string, PhaseUsageReport>>();

  /**
   * Track token usage from an LLM call
   */
  track(usage: ExtendedTokenUsage): void {
    let phases = this.components.get(usage.component);
    if (!phases) {
      phases = new Map();
      this.components.set(usage.component, phases);
    }

    let phase = phases.get(usage.phase);
    if (!phase) {
      phase = { phase: usage.phase, total: emptyUsage() };
      phases.set(usage.phase, phase);
    }

    const slot = usage.model;
    const detail = phase[slot] ?? { modelName: usage.modelName, ...emptyUsage() };
    addUsage(detail, usage);
    phase[slot] = detail;
    addUsage(phase.total, usage);
  }

  /**
   * Structured report, detached from the aggregator's internal state
   */
  getReport(): TokenUsageReport {
    const components: ComponentUsageReport[] = [];
    const total = emptyUsage();

    for (const [component, phases] of this.components) {
      const componentTotal = emptyUsage();
      const phaseReports = [...phases.values()].map((phase) => {
        addUsage(componentTotal, phase.total);
        return {
          phase: phase.phase,
          ...(phase.primary && { primary: { ...phase.primary } }),
          ...(phase.fallback && { fallback: { ...phase.fallback } }),
          total: { ...phase.total },
        };
      });
      addUsage(total, componentTotal);
      components.push({ component, phases: phaseReports, total: componentTotal });
    }

    return { components, total };
  }

  getTotalUsage(): TokenUsage {
    return this.getReport().total;
  }

  /**
   * Log usage grouped by component, with phase and model breakdown.
   */
  logSummary(logger: LoggerMethods, prefix = '[TranscriptRefiner]'): void {
    const report = this.getReport();

    if (report.components.length === 0) {
      logger.info(`${prefix} No token usage to report`);
      return;
    }

    logger.info(`${prefix} Token usage summary:`);
    for (const component of report.components) {
      logger.info(`${component.component}:`);
      for (const phase of component.phases) {
        if (phase.primary) {
          logger.info(
            `  - ${phase.phase} (primary: ${phase.primary.modelName}): ${formatTokens(phase.primary)}`,
          );
        }
        if (phase.fallback) {
          logger.info(
            `  - ${phase.phase} (fallback: ${phase.fallback.modelName}): ${formatTokens(phase.fallback)}`,
          );
        }
      }
      logger.info(
        `  ${component.component} total: ${formatTokens(component.total)}`,
      );
    }
    logger.info(`Grand total: ${formatTokens(report.total)}`);
  }

  /**
   * Reset all tracked usage
   */
  reset(): void {
    this.components.clear();
  }
}
