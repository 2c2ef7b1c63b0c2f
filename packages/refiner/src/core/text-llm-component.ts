import type { LoggerMethods } from '@refinaria/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@refinaria/shared';
import type { LanguageModel } from 'ai';
import type { z } from 'zod';

import { LLMCaller } from '@refinaria/shared';

import {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';

export type { BaseLLMComponentOptions } from './base-llm-component';

/**
 * Abstract base class for text-based LLM components
 *
 * Extends BaseLLMComponent with helpers for structured (JSON) and free-text
 * calls through LLMCaller.
 *
 * Subclasses: SmartChunker, RefinementInvoker
 */
export abstract class TextLLMComponent extends BaseLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, model, componentName, options, fallbackModel, aggregator);
  }

  /**
   * Call LLM for a JSON object validated by `schema`
   *
   * @param phase - Phase name for tracking (e.g., 'segmentation')
   */
  protected async callStructuredLLM<TOutput>(
    schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>,
    systemPrompt: string,
    userPrompt: string,
    phase: string,
  ): Promise<{ output: TOutput; usage: ExtendedTokenUsage }> {
    const result = await LLMCaller.call({
      schema,
      systemPrompt,
      userPrompt,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      timeoutMs: this.timeoutMs,
      component: this.componentName,
      phase,
    });

    this.trackUsage(result.usage);

    return { output: result.output, usage: result.usage };
  }

  /**
   * Call LLM for free text
   *
   * @param onTextDelta - Receives streamed text as it arrives; the call still
   * resolves with the whole answer
   */
  protected async callTextGeneration(
    systemPrompt: string,
    userPrompt: string,
    phase: string,
    onTextDelta?: (delta: string) => void,
  ): Promise<{ output: string; usage: ExtendedTokenUsage }> {
    const result = await LLMCaller.callText({
      systemPrompt,
      userPrompt,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      timeoutMs: this.timeoutMs,
      component: this.componentName,
      phase,
      onTextDelta,
    });

    this.trackUsage(result.usage);

    return { output: result.output, usage: result.usage };
  }
}
