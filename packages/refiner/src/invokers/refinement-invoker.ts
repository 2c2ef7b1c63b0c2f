import type { LoggerMethods } from '@refinaria/logger';
import type {
  Chunk,
  FallbackReason,
  RefinementResult,
  RefinementState,
} from '@refinaria/model';
import type { LLMTokenUsageAggregator } from '@refinaria/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@refinaria/shared';

import {
  type ContentStyleClassifier,
  KeywordContentStyleClassifier,
} from '../classifiers/content-style-classifier';
import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '../core/text-llm-component';
import { ContractViolationError } from '../errors/contract-violation-error';
import {
  type RefinementPromptContext,
  buildRefinementSystemPrompt,
  buildRefinementUserPrompt,
} from '../prompts/refinement-prompts';
import { TextCleaner } from '../utils/text-cleaner';
import {
  type RefinementCache,
  createRefinementCacheKey,
} from './refinement-cache';

export interface RefinementInvokerOptions extends BaseLLMComponentOptions {
  /**
   * Fixed wait between attempts after a failed model call (default: 2000)
   */
  retryDelayMs?: number;

  /**
   * Answers shorter than this share of the chunk are degraded (default: 0.7)
   */
  minContentRatio?: number;

  /**
   * Answers longer than this multiple of the chunk are degraded (default: 2.0)
   */
  maxContentRatio?: number;

  /**
   * Context window of the model in tokens (default: 8192)
   */
  contextWindowTokens?: number;

  /**
   * Picks the prompt style per chunk (default: KeywordContentStyleClassifier)
   */
  classifier?: ContentStyleClassifier;

  cache?: RefinementCache;

  /**
   * Streams the model answer; receives every text delta with its chunk index
   */
  onTextDelta?: (delta: string, chunkIndex: number) => void;
}

interface SplitText {
  left: string;
  separator: string;
  right: string;
}

/**
 * Rough token count for Latin-script text
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * RefinementInvoker - Refines one chunk with the model
 *
 * Every chunk runs through an explicit state sequence recorded in
 * `RefinementResult.history`:
 *
 * - `attempting(n)`: one model call. A failed call (transport error, timeout)
 *   is retried after a fixed delay, up to `maxRetries` times.
 * - `degraded`: the cleaned answer is shorter than `minContentRatio` or longer
 *   than `maxContentRatio` of the chunk. The chunk is asked for once more with
 *   an emphasized instruction.
 * - `succeeded`: the answer is accepted.
 * - `fallen-back`: the original chunk text is kept.
 *
 * Model failures never escape `refine`; only a malformed chunk throws.
 *
 * A chunk whose prompt would not fit the context window is split in two near
 * its middle (at a sentence boundary when there is one) and each half is
 * refined on its own. The halves are joined with the original whitespace and
 * reported as one result for the chunk.
 */
export class RefinementInvoker extends TextLLMComponent {
  private readonly retryLimit: number;
  private readonly retryDelayMs: number;
  private readonly minContentRatio: number;
  private readonly maxContentRatio: number;
  private readonly contextWindowTokens: number;
  private readonly classifier: ContentStyleClassifier;
  private readonly cache?: RefinementCache;
  private readonly onTextDelta?: (delta: string, chunkIndex: number) => void;

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options: RefinementInvokerOptions = {},
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    // Retries are counted here, not inside the SDK
    super(
      logger,
      model,
      'RefinementInvoker',
      { ...options, maxRetries: 0 },
      fallbackModel,
      aggregator,
    );
    this.retryLimit = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.minContentRatio = options.minContentRatio ?? 0.7;
    this.maxContentRatio = options.maxContentRatio ?? 2.0;
    this.contextWindowTokens = options.contextWindowTokens ?? 8192;
    this.classifier = options.classifier ?? new KeywordContentStyleClassifier();
    this.cache = options.cache;
    this.onTextDelta = options.onTextDelta;

    ContractViolationError.assert(
      Number.isInteger(this.retryLimit) && this.retryLimit >= 0,
      `maxRetries must be a non-negative integer, got ${this.retryLimit}`,
    );
    ContractViolationError.assert(
      this.retryDelayMs >= 0,
      `retryDelayMs must not be negative, got ${this.retryDelayMs}`,
    );
    ContractViolationError.assert(
      this.minContentRatio > 0 && this.minContentRatio <= 1,
      `minContentRatio must be in (0, 1], got ${this.minContentRatio}`,
    );
    ContractViolationError.assert(
      this.maxContentRatio > 1,
      `maxContentRatio must be greater than 1, got ${this.maxContentRatio}`,
    );
    ContractViolationError.assert(
      Number.isInteger(this.contextWindowTokens) && this.contextWindowTokens > 0,
      `contextWindowTokens must be a positive integer, got ${this.contextWindowTokens}`,
    );
  }

  /**
   * @param total - Number of chunks in the document, shown to the model
   * @throws ContractViolationError when the chunk is empty or its index is invalid
   */
  async refine(
    chunk: Chunk,
    total: number = chunk.index + 1,
  ): Promise<RefinementResult> {
    ContractViolationError.assert(
      Number.isInteger(chunk.index) && chunk.index >= 0,
      `Chunk index must be a non-negative integer, got ${chunk.index}`,
    );
    ContractViolationError.assert(
      chunk.text.trim().length > 0,
      `Chunk ${chunk.index} is empty`,
    );

    const systemPrompt = this.buildSystemPrompt(chunk.text);
    const context = { position: chunk.index + 1, total };

    return this.refineText(chunk.text, chunk.index, context, systemPrompt);
  }

  protected buildSystemPrompt(text: string): string {
    return buildRefinementSystemPrompt(this.classifier.classify(text));
  }

  protected buildUserPrompt(
    text: string,
    context: RefinementPromptContext,
  ): string {
    return buildRefinementUserPrompt(text, context);
  }

  private async refineText(
    text: string,
    chunkIndex: number,
    context: Omit<RefinementPromptContext, 'emphasized'>,
    systemPrompt: string,
  ): Promise<RefinementResult> {
    const split = this.fitsContextWindow(text, context, systemPrompt)
      ? undefined
      : RefinementInvoker.splitInHalf(text);

    if (!split) {
      return this.refineWhole(text, chunkIndex, context, systemPrompt);
    }

    this.log(
      'info',
      `Chunk ${context.position} exceeds the context window (${this.contextWindowTokens} tokens), refining it in two halves`,
    );
    const left = await this.refineText(
      split.left,
      chunkIndex,
      context,
      systemPrompt,
    );
    const right = await this.refineText(
      split.right,
      chunkIndex,
      context,
      systemPrompt,
    );

    return RefinementInvoker.combine(text, split.separator, left, right);
  }

  private async refineWhole(
    text: string,
    chunkIndex: number,
    context: Omit<RefinementPromptContext, 'emphasized'>,
    systemPrompt: string,
  ): Promise<RefinementResult> {
    const cacheKey = this.cache
      ? createRefinementCacheKey(
          LLMCaller.extractModelName(this.model),
          systemPrompt,
          text,
        )
      : undefined;

    const cached =
      cacheKey === undefined ? undefined : this.cache?.get(cacheKey);
    if (cached !== undefined) {
      const contentRatio = cached.length / text.length;
      this.log('debug', `Chunk ${context.position} served from cache`);
      return {
        chunkIndex,
        refinedText: cached,
        usedFallback: false,
        attemptCount: 0,
        contentRatio,
        finalState: 'succeeded',
        fromCache: true,
        pieces: 1,
        history: [{ kind: 'succeeded', contentRatio }],
      };
    }

    const history: RefinementState[] = [];
    const fallBack = (reason: FallbackReason): RefinementResult => {
      history.push({ kind: 'fallen-back', reason });
      this.log(
        'warn',
        `Chunk ${context.position} keeps its original text (${reason}) after ${attemptCount} attempt(s)`,
      );
      return {
        chunkIndex,
        refinedText: text,
        usedFallback: true,
        attemptCount,
        contentRatio: 1,
        finalState: 'fallen-back',
        fallbackReason: reason,
        fromCache: false,
        pieces: 1,
        history,
      };
    };

    const onTextDelta = this.onTextDelta;
    const forwardDelta = onTextDelta
      ? (delta: string) => onTextDelta(delta, chunkIndex)
      : undefined;

    let attemptCount = 0;
    let failedCalls = 0;
    let emphasized = false;

    for (;;) {
      attemptCount++;
      history.push({ kind: 'attempting', attempt: attemptCount, emphasized });
      this.log(
        'debug',
        `Chunk ${context.position}/${context.total} attempt ${attemptCount}${emphasized ? ' (emphasized)' : ''}`,
      );

      let answer: string;
      try {
        const response = await this.callTextGeneration(
          systemPrompt,
          this.buildUserPrompt(text, { ...context, emphasized }),
          'refinement',
          forwardDelta,
        );
        answer = response.output;
      } catch (error) {
        failedCalls++;
        if (failedCalls > this.retryLimit) {
          this.log(
            'error',
            `Model call failed for chunk ${context.position}:`,
            error,
          );
          return fallBack('model-unavailable');
        }
        this.log(
          'warn',
          `Model call failed for chunk ${context.position}, retrying in ${this.retryDelayMs} ms:`,
          error,
        );
        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
        continue;
      }

      const refinedText = TextCleaner.cleanResponse(answer);
      const contentRatio = refinedText.length / text.length;

      if (
        contentRatio >= this.minContentRatio &&
        contentRatio <= this.maxContentRatio
      ) {
        history.push({ kind: 'succeeded', contentRatio });
        if (cacheKey !== undefined) {
          this.storeInCache(cacheKey, refinedText, context.position);
        }
        return {
          chunkIndex,
          refinedText,
          usedFallback: false,
          attemptCount,
          contentRatio,
          finalState: 'succeeded',
          fromCache: false,
          pieces: 1,
          history,
        };
      }

      history.push({ kind: 'degraded', contentRatio });
      this.log(
        'warn',
        `Chunk ${context.position} answer has content ratio ${contentRatio.toFixed(2)}`,
      );

      if (emphasized) {
        return fallBack(
          contentRatio < this.minContentRatio
            ? 'content-loss'
            : 'content-expansion',
        );
      }
      emphasized = true;
    }
  }

  /**
   * A cache write failure (disk full, unwritable directory) loses only the
   * cache entry; the refined chunk is still returned.
   */
  private storeInCache(
    key: string,
    refinedText: string,
    position: number,
  ): void {
    try {
      this.cache?.set(key, refinedText);
    } catch (error) {
      this.log('warn', `Failed to cache chunk ${position}:`, error);
    }
  }

  private fitsContextWindow(
    text: string,
    context: Omit<RefinementPromptContext, 'emphasized'>,
    systemPrompt: string,
  ): boolean {
    // The answer is about as long as the chunk
    const required =
      estimateTokens(systemPrompt) +
      estimateTokens(
        this.buildUserPrompt(text, { ...context, emphasized: true }),
      ) +
      estimateTokens(text);
    return required <= this.contextWindowTokens;
  }

  /**
   * Splits at the sentence boundary closest to the middle, or at the closest
   * whitespace when the text is a single sentence. Returns undefined for a
   * single word.
   */
  static splitInHalf(text: string): SplitText | undefined {
    const sentences = TextCleaner.findSentences(text);
    const spans =
      sentences.length >= 2 ? sentences : TextCleaner.findWords(text);
    if (spans.length < 2) {
      return undefined;
    }

    const middle = text.length / 2;
    let best = 1;
    for (let index = 2; index < spans.length; index++) {
      if (
        Math.abs(spans[index].start - middle) <
        Math.abs(spans[best].start - middle)
      ) {
        best = index;
      }
    }

    const leftEnd = spans[best - 1].end;
    const rightStart = spans[best].start;
    return {
      left: text.slice(0, leftEnd),
      separator: text.slice(leftEnd, rightStart),
      right: text.slice(rightStart),
    };
  }

  private static combine(
    text: string,
    separator: string,
    left: RefinementResult,
    right: RefinementResult,
  ): RefinementResult {
    const refinedText = left.refinedText + separator + right.refinedText;
    const usedFallback = left.usedFallback || right.usedFallback;
    return {
      chunkIndex: left.chunkIndex,
      refinedText,
      usedFallback,
      attemptCount: left.attemptCount + right.attemptCount,
      contentRatio: refinedText.length / text.length,
      finalState: usedFallback ? 'fallen-back' : 'succeeded',
      fallbackReason: left.fallbackReason ?? right.fallbackReason,
      fromCache: left.fromCache && right.fromCache,
      pieces: left.pieces + right.pieces,
      history: [...left.history, ...right.history],
    };
  }
}
