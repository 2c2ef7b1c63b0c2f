import type { LoggerMethods } from '@refinaria/logger';
import type {
  Chunk,
  ChunkingMode,
  ProcessingStats,
  RefinementResult,
  RefinementRun,
} from '@refinaria/model';
import type { LanguageModel } from 'ai';

import { LLMTokenUsageAggregator } from '@refinaria/shared';

import type { ContentStyleClassifier } from './classifiers/content-style-classifier';
import type { BaseLLMComponentOptions } from './core/base-llm-component';
import type { RefinementCache } from './invokers/refinement-cache';

import { SmartChunker } from './chunkers/smart-chunker';
import { TextChunker } from './chunkers/text-chunker';
import { TermDictionary } from './corrections/term-dictionary';
import { ContractViolationError } from './errors/contract-violation-error';
import { RefinementInvoker } from './invokers/refinement-invoker';
import { QualityValidator } from './quality/quality-validator';
import { TextCleaner } from './utils/text-cleaner';

export interface RefinementProgress {
  completed: number;
  total: number;
}

/**
 * Options of one pipeline run. Defaults match the CLI defaults.
 */
export interface RefineOptions {
  /**
   * Chunking strategy (default: 'paragraph-aware')
   */
  chunkingMode?: ChunkingMode;

  /**
   * Target chunk size in words (default: 800)
   */
  maxWordsPerChunk?: number;

  /**
   * Retries per chunk after a failed model call (default: 3)
   */
  maxRetries?: number;

  /**
   * Fixed wait between retries in milliseconds (default: 2000)
   */
  retryDelayMs?: number;

  /**
   * Per-chunk lower content ratio bound (default: 0.7)
   */
  minContentRatio?: number;

  /**
   * Per-chunk upper content ratio bound (default: 2.0)
   */
  maxContentRatio?: number;

  /**
   * The run is flagged degraded when output/input falls below this (default: 0.5)
   */
  globalLossThreshold?: number;

  contextWindowTokens?: number;
  timeoutMs?: number;

  /**
   * Generation temperature (default: 0.1)
   */
  temperature?: number;

  /**
   * Model tried once whenever the primary model call fails
   */
  fallbackModel?: LanguageModel;

  cache?: RefinementCache;

  /**
   * Normalize line endings, spacing and hyphenated line breaks before
   * correction (default: false)
   */
  normalizeInput?: boolean;

  /**
   * Checked between chunks; a cancelled run returns the chunks refined so far
   * and is marked incomplete
   */
  abortSignal?: AbortSignal;

  onChunkRefined?: (
    result: RefinementResult,
    progress: RefinementProgress,
  ) => void;

  onTextDelta?: (delta: string, chunkIndex: number) => void;
}

/**
 * TranscriptRefiner
 *
 * Runs the refinement pipeline over one transcript:
 *
 * 1. Dictionary pass over the raw text
 * 2. Chunking (paragraph-aware, word-count or smart)
 * 3. Refinement of each chunk in order, one model call at a time
 * 4. Quality check and dictionary pass over each refined chunk
 * 5. Reassembly with the original whitespace between chunks
 * 6. Statistics, including the global content-loss check
 *
 * A run holds no state on the instance, so one refiner may serve several
 * files at once. Given the same input and model answers the output is
 * identical.
 *
 * @example
 * ```typescript
 * const refiner = new TranscriptRefiner(createConsoleLogger());
 * const { text, stats } = await refiner.process(raw, createModel('ollama/llama3.2:latest'), {
 *   maxWordsPerChunk: 800,
 * });
 * if (stats.degraded) console.warn('Output lost too much content');
 * ```
 */
export class TranscriptRefiner {
  private readonly logger: LoggerMethods;
  private readonly dictionary: TermDictionary;
  private readonly textChunker: TextChunker;
  private readonly classifier?: ContentStyleClassifier;
  private readonly qualityValidator: QualityValidator;

  constructor(
    logger: LoggerMethods,
    dictionary: TermDictionary = TermDictionary.builtin(),
    textChunker: TextChunker = new TextChunker(),
    classifier?: ContentStyleClassifier,
    qualityValidator: QualityValidator = new QualityValidator(),
  ) {
    this.logger = logger;
    this.dictionary = dictionary;
    this.textChunker = textChunker;
    this.classifier = classifier;
    this.qualityValidator = qualityValidator;
  }

  async process(
    rawText: string,
    model: LanguageModel,
    options: RefineOptions = {},
  ): Promise<RefinementRun> {
    const globalLossThreshold = options.globalLossThreshold ?? 0.5;
    ContractViolationError.assert(
      globalLossThreshold > 0 && globalLossThreshold <= 1,
      `globalLossThreshold must be in (0, 1], got ${globalLossThreshold}`,
    );

    const startedAt = Date.now();
    const aggregator = new LLMTokenUsageAggregator();
    const mode = options.chunkingMode ?? 'paragraph-aware';
    const targetSize = options.maxWordsPerChunk ?? 800;
    const componentOptions = {
      maxRetries: options.maxRetries ?? 3,
      temperature: options.temperature ?? 0.1,
      timeoutMs: options.timeoutMs,
    };

    const source = options.normalizeInput
      ? TextCleaner.normalize(rawText)
      : rawText;
    const firstPass = this.dictionary.correct(source);
    this.logger.info(
      `[TranscriptRefiner] ${firstPass.applied.length} corrections before refinement`,
    );

    const chunks = await this.chunk(
      firstPass.corrected,
      targetSize,
      mode,
      model,
      componentOptions,
      options.fallbackModel,
      aggregator,
    );
    this.logger.info(
      `[TranscriptRefiner] ${chunks.length} chunks (${mode}, target ${targetSize} words)`,
    );

    const invoker = new RefinementInvoker(
      this.logger,
      model,
      {
        ...componentOptions,
        retryDelayMs: options.retryDelayMs,
        minContentRatio: options.minContentRatio,
        maxContentRatio: options.maxContentRatio,
        contextWindowTokens: options.contextWindowTokens,
        classifier: this.classifier,
        cache: options.cache,
        onTextDelta: options.onTextDelta,
      },
      options.fallbackModel,
      aggregator,
    );

    const results: RefinementResult[] = [];
    const finalTexts: string[] = [];
    let correctionsAfterRefinement = 0;
    let incomplete = false;

    for (const chunk of chunks) {
      if (options.abortSignal?.aborted) {
        incomplete = true;
        this.logger.warn(
          `[TranscriptRefiner] Cancelled after ${results.length} of ${chunks.length} chunks`,
        );
        break;
      }

      const result = this.checkQuality(
        chunk,
        await invoker.refine(chunk, chunks.length),
      );
      const secondPass = this.dictionary.correct(result.refinedText);
      correctionsAfterRefinement += secondPass.applied.length;

      results.push(result);
      finalTexts.push(secondPass.corrected);
      options.onChunkRefined?.(result, {
        completed: results.length,
        total: chunks.length,
      });
    }

    const text = TextChunker.reassemble(
      firstPass.corrected,
      chunks,
      finalTexts,
    );
    const stats = this.buildStats({
      chunks,
      results,
      finalTexts,
      correctionsBeforeRefinement: firstPass.applied.length,
      correctionsAfterRefinement,
      incomplete,
      globalLossThreshold,
      text,
      aggregator,
      elapsedMs: Date.now() - startedAt,
    });

    if (stats.degraded) {
      this.logger.warn(
        `[TranscriptRefiner] Output is ${(stats.contentRatio * 100).toFixed(1)}% of the input, below the global loss threshold`,
      );
    }
    this.logger.info(
      `[TranscriptRefiner] Refined ${stats.chunksProcessed}/${stats.chunksTotal} chunks, ${stats.fallbacksTriggered} fallbacks, ${stats.correctionsApplied} corrections`,
    );
    aggregator.logSummary(this.logger);

    return { text, stats, results };
  }

  private checkQuality(
    chunk: Chunk,
    result: RefinementResult,
  ): RefinementResult {
    if (result.usedFallback) {
      return result;
    }

    const quality = this.qualityValidator.validate(
      chunk.text,
      result.refinedText,
    );
    if (quality.warnings.length > 0) {
      this.logger.warn(
        `[TranscriptRefiner] Chunk ${chunk.index + 1} quality: ${quality.warnings.join('; ')}`,
      );
    }
    return { ...result, quality };
  }

  private async chunk(
    text: string,
    targetSize: number,
    mode: ChunkingMode,
    model: LanguageModel,
    componentOptions: BaseLLMComponentOptions,
    fallbackModel: LanguageModel | undefined,
    aggregator: LLMTokenUsageAggregator,
  ): Promise<Chunk[]> {
    if (mode !== 'smart') {
      return this.textChunker.chunk(text, targetSize, mode);
    }

    const smartChunker = new SmartChunker(
      this.logger,
      model,
      componentOptions,
      fallbackModel,
      aggregator,
      this.textChunker,
    );
    return smartChunker.chunk(text, targetSize);
  }

  private buildStats(run: {
    chunks: readonly Chunk[];
    results: readonly RefinementResult[];
    finalTexts: readonly string[];
    correctionsBeforeRefinement: number;
    correctionsAfterRefinement: number;
    incomplete: boolean;
    globalLossThreshold: number;
    text: string;
    aggregator: LLMTokenUsageAggregator;
    elapsedMs: number;
  }): Readonly<ProcessingStats> {
    const inputChars = run.chunks
      .slice(0, run.results.length)
      .reduce((sum, chunk) => sum + chunk.text.length, 0);
    const outputChars = run.finalTexts.reduce(
      (sum, text) => sum + text.length,
      0,
    );
    const contentRatio = inputChars === 0 ? 1 : outputChars / inputChars;

    return Object.freeze({
      chunksTotal: run.chunks.length,
      chunksProcessed: run.results.length,
      correctionsApplied:
        run.correctionsBeforeRefinement + run.correctionsAfterRefinement,
      correctionsBeforeRefinement: run.correctionsBeforeRefinement,
      correctionsAfterRefinement: run.correctionsAfterRefinement,
      fallbacksTriggered: run.results.filter((result) => result.usedFallback)
        .length,
      modelAttempts: run.results.reduce(
        (sum, result) => sum + result.attemptCount,
        0,
      ),
      cacheHits: run.results.filter((result) => result.fromCache).length,
      inputChars,
      outputChars,
      contentRatio,
      degraded: contentRatio < run.globalLossThreshold,
      incomplete: run.incomplete,
      elapsedMs: run.elapsedMs,
      quality: QualityValidator.summarize(
        run.results.map((result) => result.quality),
      ),
      suggestions: this.dictionary.suggest(run.text),
      tokenUsage: run.aggregator.getReport(),
    });
  }
}
