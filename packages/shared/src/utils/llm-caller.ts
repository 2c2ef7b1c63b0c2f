import type { z } from 'zod';

import {
  type LanguageModel,
  NoObjectGeneratedError,
  Output,
  generateText,
  hasToolCall,
  streamText,
  tool,
} from 'ai';

import { StructuredOutputError } from '../errors/structured-output-error';
import { detectProvider } from './provider-detector';

/**
 * Settings shared by every LLM call
 */
export interface LLMCallBaseConfig {
  /**
   * System prompt for LLM
   */
  systemPrompt: string;

  /**
   * User prompt for LLM
   */
  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once the primary model fails (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Retries the AI SDK performs per model on retryable API errors
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Upper bound for a single model call; the call is aborted once it elapses
   */
  timeoutMs?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'RefinementInvoker', 'SmartChunker')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'refinement', 'segmentation')
   */
  phase: string;
}

/**
 * Configuration for a call whose answer must be a JSON object
 */
export interface LLMCallConfig<TSchema extends z.ZodType>
  extends LLMCallBaseConfig {
  /**
   * Zod schema for response validation
   */
  schema: TSchema;
}

/**
 * Configuration for a free-text call
 */
export interface LLMTextCallConfig extends LLMCallBaseConfig {
  /**
   * When set, the answer is streamed and every text delta is passed here.
   * The call still resolves only once the full answer has arrived.
   */
  onTextDelta?: (delta: string) => void;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallbackModel: boolean;
}

interface RawUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

interface GenerationResponse<T> {
  output: T;
  usage?: RawUsage;
}

interface PromptParams {
  system: string;
  prompt: string;
  temperature?: number;
  maxRetries: number;
}

const SUBMIT_TOOL_NAME = 'submitResult';

/**
 * LLMCaller - Centralized LLM API caller with timeout and fallback support
 *
 * Wraps AI SDK's generateText/streamText:
 * 1. Try the primary model (the SDK retries retryable API errors maxRetries times)
 * 2. If it fails and a fallbackModel is provided, try the fallback model
 * 3. Return usage data with model type indicator
 *
 * Structured calls use `Output.object` for providers with a JSON schema mode
 * (OpenAI, Anthropic, Ollama) and a forced tool call for any other provider.
 *
 * Every attempt is bounded by `timeoutMs` when given.
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.callText({
 *   systemPrompt: 'Você é um revisor de transcrições...',
 *   userPrompt: chunkText,
 *   primaryModel: createModel('ollama/llama3.2:latest'),
 *   maxRetries: 0,
 *   timeoutMs: 120_000,
 *   component: 'RefinementInvoker',
 *   phase: 'refinement',
 * });
 *
 * console.log(result.output);            // Generated text
 * console.log(result.usage);             // Token usage with model info
 * console.log(result.usedFallbackModel); // Whether the fallback model answered
 * ```
 */
export class LLMCaller {
  /**
   * Maximum number of retries when the answer is not a valid object.
   * Total attempts = MAX_STRUCTURED_OUTPUT_RETRIES + 1.
   */
  private static readonly MAX_STRUCTURED_OUTPUT_RETRIES = 2;

  /**
   * Model id for usage reports
   */
  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  /**
   * Build usage information from response
   */
  private static buildUsage(
    config: LLMCallBaseConfig,
    modelName: string,
    usage: RawUsage | undefined,
    usedFallbackModel: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallbackModel ? 'fallback' : 'primary',
      modelName,
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
      totalTokens: usage?.totalTokens ?? 0,
    };
  }

  /**
   * Signal for one attempt: the caller's signal, the timeout, or both
   */
  private static createAttemptSignal(
    config: LLMCallBaseConfig,
  ): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (config.abortSignal) {
      signals.push(config.abortSignal);
    }
    if (config.timeoutMs !== undefined) {
      signals.push(AbortSignal.timeout(config.timeoutMs));
    }

    if (signals.length <= 1) {
      return signals[0];
    }
    return AbortSignal.any(signals);
  }

  private static async generateFreeText(
    model: LanguageModel,
    params: PromptParams,
    abortSignal: AbortSignal | undefined,
  ): Promise<GenerationResponse<string>> {
    const result = await generateText({ ...params, model, abortSignal });
    return { output: result.text, usage: result.usage };
  }

  /**
   * Stream the answer, forwarding deltas as they arrive.
   *
   * streamText reports failures through onError instead of throwing, so the
   * error is captured and rethrown after the stream ends.
   */
  private static async streamFreeText(
    model: LanguageModel,
    params: PromptParams,
    abortSignal: AbortSignal | undefined,
    onTextDelta: (delta: string) => void,
  ): Promise<GenerationResponse<string>> {
    const failure: { error?: unknown } = {};
    const result = streamText({
      ...params,
      model,
      abortSignal,
      onError: ({ error }) => {
        failure.error = error;
      },
    });

    let text = '';
    for await (const delta of result.textStream) {
      text += delta;
      onTextDelta(delta);
    }

    if (failure.error !== undefined) {
      throw failure.error;
    }
    if (abortSignal?.aborted) {
      throw abortSignal.reason;
    }

    return { output: text, usage: await result.usage };
  }

  private static addUsage(
    total: Required<RawUsage>,
    usage: RawUsage | undefined,
  ): void {
    total.inputTokens += usage?.inputTokens ?? 0;
    total.outputTokens += usage?.outputTokens ?? 0;
    total.totalTokens += usage?.totalTokens ?? 0;
  }

  /**
   * Single attempt through the provider's structured output mode
   */
  private static async generateViaOutputObject<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>,
    params: PromptParams,
    abortSignal: AbortSignal | undefined,
  ): Promise<GenerationResponse<TOutput>> {
    const result = await generateText({
      ...params,
      model,
      abortSignal,
      experimental_output: Output.object({ schema }),
    });
    return { output: result.experimental_output, usage: result.usage };
  }

  /**
   * Single attempt through a forced tool call
   *
   * For providers without a native JSON schema mode. The model must call
   * `submitResult`, whose input is validated against the schema.
   *
   * @throws NoObjectGeneratedError when no valid tool call was produced
   */
  private static async generateViaToolCall<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>,
    params: PromptParams,
    abortSignal: AbortSignal | undefined,
  ): Promise<GenerationResponse<TOutput>> {
    const result = await generateText({
      ...params,
      model,
      abortSignal,
      tools: {
        [SUBMIT_TOOL_NAME]: tool({
          description: 'Submit the structured result',
          inputSchema: schema,
        }),
      },
      toolChoice: { type: 'tool', toolName: SUBMIT_TOOL_NAME },
      stopWhen: hasToolCall(SUBMIT_TOOL_NAME),
    });

    const submitted = result.toolCalls.find(
      (toolCall) => toolCall.toolName === SUBMIT_TOOL_NAME,
    );
    const parsed = submitted ? schema.safeParse(submitted.input) : undefined;
    if (parsed?.success) {
      return { output: parsed.data, usage: result.usage };
    }

    throw new NoObjectGeneratedError({
      message: 'Model did not produce a tool call for structured output',
      text: result.text,
      response: result.response,
      usage: result.usage,
      finishReason: result.finishReason,
    });
  }

  /**
   * Generate an object matching the schema.
   *
   * Retries up to MAX_STRUCTURED_OUTPUT_RETRIES times on NoObjectGeneratedError
   * (unparseable answer or schema mismatch). Usage of every attempt counts.
   * Any other error propagates at once.
   *
   * @throws StructuredOutputError when no attempt produced a valid object
   */
  private static async generateStructuredOutput<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>,
    params: PromptParams,
    abortSignal: AbortSignal | undefined,
  ): Promise<GenerationResponse<TOutput>> {
    const useToolCall = detectProvider(model) === 'unknown';
    const usage: Required<RawUsage> = {
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
    };
    let lastError: unknown;
    let lastText = '';

    for (
      let attempt = 0;
      attempt <= this.MAX_STRUCTURED_OUTPUT_RETRIES;
      attempt++
    ) {
      try {
        const response = useToolCall
          ? await this.generateViaToolCall(model, schema, params, abortSignal)
          : await this.generateViaOutputObject(
              model,
              schema,
              params,
              abortSignal,
            );
        this.addUsage(usage, response.usage);
        return { output: response.output, usage };
      } catch (error) {
        if (!NoObjectGeneratedError.isInstance(error)) {
          throw error;
        }
        this.addUsage(usage, error.usage);
        lastError = error;
        lastText = error.text ?? '';
      }
    }

    throw new StructuredOutputError(
      `Model did not produce a valid object after ${this.MAX_STRUCTURED_OUTPUT_RETRIES + 1} attempts`,
      lastText,
      { cause: lastError },
    );
  }

  /**
   * Execute LLM call with fallback support
   *
   * Common execution logic for both free-text and structured calls.
   */
  private static async executeWithFallback<TOutput>(
    config: LLMCallBaseConfig,
    generateFn: (
      model: LanguageModel,
      abortSignal: AbortSignal | undefined,
    ) => Promise<GenerationResponse<TOutput>>,
  ): Promise<LLMCallResult<TOutput>> {
    const primaryModelName = this.extractModelName(config.primaryModel);

    try {
      const response = await generateFn(
        config.primaryModel,
        this.createAttemptSignal(config),
      );

      return {
        output: response.output,
        usage: this.buildUsage(config, primaryModelName, response.usage, false),
        usedFallbackModel: false,
      };
    } catch (primaryError) {
      // Cancelled by the caller: the fallback model must not run either
      if (config.abortSignal?.aborted) {
        throw primaryError;
      }

      if (!config.fallbackModel) {
        throw primaryError;
      }

      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await generateFn(
        config.fallbackModel,
        this.createAttemptSignal(config),
      );

      return {
        output: response.output,
        usage: this.buildUsage(config, fallbackModelName, response.usage, true),
        usedFallbackModel: true,
      };
    }
  }

  private static toPromptParams(config: LLMCallBaseConfig): PromptParams {
    return {
      system: config.systemPrompt,
      prompt: config.userPrompt,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
    };
  }

  /**
   * Call LLM for a JSON object validated by `config.schema`
   *
   * @throws StructuredOutputError if no valid object was produced
   * @throws the model error if both primary and fallback model calls fail
   */
  static async call<TOutput = unknown>(
    config: LLMCallConfig<z.ZodType<TOutput, z.ZodTypeDef, unknown>>,
  ): Promise<LLMCallResult<TOutput>> {
    const params = this.toPromptParams(config);
    return this.executeWithFallback(config, (model, abortSignal) =>
      this.generateStructuredOutput(model, config.schema, params, abortSignal),
    );
  }

  /**
   * Call LLM for free text, streaming when `onTextDelta` is set
   */
  static async callText(
    config: LLMTextCallConfig,
  ): Promise<LLMCallResult<string>> {
    const params = this.toPromptParams(config);
    const { onTextDelta } = config;

    return this.executeWithFallback(config, (model, abortSignal) =>
      onTextDelta
        ? this.streamFreeText(model, params, abortSignal, onTextDelta)
        : this.generateFreeText(model, params, abortSignal),
    );
  }
}
