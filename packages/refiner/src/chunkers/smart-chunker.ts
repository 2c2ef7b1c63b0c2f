import type { LoggerMethods } from '@refinaria/logger';
import type { Chunk } from '@refinaria/model';
import type { LLMTokenUsageAggregator } from '@refinaria/shared';
import type { LanguageModel } from 'ai';

import { z } from 'zod';

import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '../core/text-llm-component';
import { ContractViolationError } from '../errors/contract-violation-error';
import {
  SEGMENTATION_SYSTEM_PROMPT,
  buildSegmentationUserPrompt,
} from '../prompts/segmentation-prompts';
import { type TextSpan, TextCleaner } from '../utils/text-cleaner';
import { TextChunker } from './text-chunker';

const segmentationSchema = z.object({
  breaks: z.array(z.number().int()),
});

/**
 * SmartChunker - Topic-aware chunking with the model's help
 *
 * Numbers the sentences of the text, asks the model where new topics start,
 * and packs the resulting segments up to the target size the way paragraphs
 * are packed. Chunks follow the same offset and reassembly rules as
 * TextChunker.
 *
 * Falls back to paragraph-aware chunking when the call fails, the answer is
 * not a valid object, or a proposed segment is longer than the unbroken text
 * limit.
 */
export class SmartChunker extends TextLLMComponent {
  private readonly textChunker: TextChunker;

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
    textChunker: TextChunker = new TextChunker(),
  ) {
    super(logger, model, 'SmartChunker', options, fallbackModel, aggregator);
    this.textChunker = textChunker;
  }

  async chunk(text: string, targetSize: number): Promise<Chunk[]> {
    ContractViolationError.assert(
      Number.isInteger(targetSize) && targetSize > 0,
      `Target size must be a positive integer, got ${targetSize}`,
    );

    const sentences = TextCleaner.findSentences(text);
    if (sentences.length < 2) {
      return this.textChunker.chunk(text, targetSize, 'paragraph-aware');
    }

    let breaks: number[];
    try {
      const { output } = await this.callStructuredLLM(
        segmentationSchema,
        this.buildSystemPrompt(),
        this.buildUserPrompt(text, sentences, targetSize),
        'segmentation',
      );
      breaks = output.breaks;
    } catch (error) {
      this.log(
        'warn',
        'Segmentation failed, using paragraph-aware chunking:',
        error,
      );
      return this.textChunker.chunk(text, targetSize, 'paragraph-aware');
    }

    const segments = SmartChunker.toSegments(
      sentences,
      SmartChunker.sanitizeBreaks(breaks, sentences.length),
    );

    const oversized = segments.find((segment) =>
      this.textChunker.exceedsUnbrokenLimit(
        TextCleaner.countWords(text.slice(segment.start, segment.end)),
        targetSize,
      ),
    );
    if (oversized) {
      this.log(
        'warn',
        `Proposed segment at offset ${oversized.start} is too long, using paragraph-aware chunking`,
      );
      return this.textChunker.chunk(text, targetSize, 'paragraph-aware');
    }

    this.log(
      'debug',
      `${sentences.length} sentences grouped into ${segments.length} segments`,
    );
    return TextChunker.pack(text, segments, targetSize);
  }

  protected buildSystemPrompt(): string {
    return SEGMENTATION_SYSTEM_PROMPT;
  }

  protected buildUserPrompt(
    text: string,
    sentences: readonly TextSpan[],
    targetSize: number,
  ): string {
    return buildSegmentationUserPrompt(
      sentences.map((sentence) =>
        text.slice(sentence.start, sentence.end).replace(/\s+/g, ' '),
      ),
      targetSize,
    );
  }

  /**
   * Unique sentence indices in `(0, sentenceCount)`, ascending
   */
  static sanitizeBreaks(
    breaks: readonly number[],
    sentenceCount: number,
  ): number[] {
    return [...new Set(breaks)]
      .filter((index) => index > 0 && index < sentenceCount)
      .sort((a, b) => a - b);
  }

  private static toSegments(
    sentences: readonly TextSpan[],
    breaks: readonly number[],
  ): TextSpan[] {
    const bounds = [0, ...breaks, sentences.length];
    const segments: TextSpan[] = [];

    for (let index = 0; index < bounds.length - 1; index++) {
      segments.push({
        start: sentences[bounds[index]].start,
        end: sentences[bounds[index + 1] - 1].end,
      });
    }
    return segments;
  }
}
