import type { LoggerMethods } from '@refinaria/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@refinaria/shared';
import type { LanguageModel } from 'ai';

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Retries the AI SDK performs on retryable API errors (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0)
   */
  temperature?: number;

  /**
   * Upper bound for a single model call in milliseconds (default: none)
   */
  timeoutMs?: number;
}

/**
 * Abstract base class for all LLM-based components
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Token usage tracking via optional aggregator
 * - Standard configuration (model, fallback, retries, temperature, timeout)
 *
 * Subclasses must implement buildSystemPrompt() and buildUserPrompt().
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly model: LanguageModel;
  protected readonly fallbackModel?: LanguageModel;
  protected readonly maxRetries: number;
  protected readonly temperature: number;
  protected readonly timeoutMs?: number;
  protected readonly componentName: string;
  protected readonly aggregator?: LLMTokenUsageAggregator;

  /**
   * @param componentName - Name used as log prefix and in usage reports (e.g., "RefinementInvoker")
   * @param fallbackModel - Model tried once when the primary model call fails
   * @param aggregator - Collects token usage of every call
   */
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    this.logger = logger;
    this.model = model;
    this.componentName = componentName;
    this.maxRetries = options?.maxRetries ?? 3;
    this.temperature = options?.temperature ?? 0;
    this.timeoutMs = options?.timeoutMs;
    this.fallbackModel = fallbackModel;
    this.aggregator = aggregator;
  }

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  /**
   * Track token usage to aggregator if available
   */
  protected trackUsage(usage: ExtendedTokenUsage): void {
    if (this.aggregator) {
      this.aggregator.track(usage);
    }
  }

  /**
   * Build system prompt for LLM call
   */
  protected abstract buildSystemPrompt(...args: unknown[]): string;

  /**
   * Build user prompt for LLM call
   */
  protected abstract buildUserPrompt(...args: unknown[]): string;
}
