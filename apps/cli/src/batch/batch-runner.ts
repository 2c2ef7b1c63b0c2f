import type { LoggerMethods } from '@refinaria/logger';
import type { ProcessingStats } from '@refinaria/model';
import type { RefineOptions, TranscriptRefiner } from '@refinaria/refiner';
import type { LanguageModel } from 'ai';

import { ConcurrentPool } from '@refinaria/shared';

import {
  outputPathFor,
  readTranscript,
  writeTranscript,
} from '../io/transcript-files';

export type BatchFileStatus = 'refined' | 'incomplete' | 'failed' | 'skipped';

export interface BatchFileResult {
  input: string;
  output?: string;
  status: BatchFileStatus;
  stats?: Readonly<ProcessingStats>;
  error?: string;
}

export interface BatchRunnerOptions {
  logger: LoggerMethods;
  refiner: Pick<TranscriptRefiner, 'process'>;
  model: LanguageModel;
  refineOptions: RefineOptions;
  outputDir: string;
  outputPrefix: string;

  /**
   * Files refined at the same time (default: 1)
   */
  maxWorkers?: number;

  /**
   * Stops every running file between chunks and skips the files not started
   */
  abortSignal?: AbortSignal;

  onFileComplete?: (result: BatchFileResult) => void;
}

/**
 * BatchRunner - Refines several transcript files
 *
 * Files run in parallel up to `maxWorkers`; chunks inside a file stay
 * sequential. A file that fails is recorded and the batch goes on. A
 * cancelled file still gets its partial output written.
 */
export class BatchRunner {
  private readonly options: BatchRunnerOptions;

  constructor(options: BatchRunnerOptions) {
    this.options = options;
  }

  async run(files: readonly string[]): Promise<BatchFileResult[]> {
    const { abortSignal, onFileComplete } = this.options;

    return ConcurrentPool.run(
      files,
      this.options.maxWorkers ?? 1,
      (file) => this.refineFile(file),
      {
        onItemComplete: onFileComplete,
        cancellation: abortSignal && {
          signal: abortSignal,
          skip: (file): BatchFileResult => ({ input: file, status: 'skipped' }),
        },
      },
    );
  }

  private async refineFile(input: string): Promise<BatchFileResult> {
    const { logger, refiner, model, refineOptions, abortSignal } =
      this.options;
    const output = outputPathFor(
      input,
      this.options.outputDir,
      this.options.outputPrefix,
    );

    try {
      logger.info(`[BatchRunner] Refining ${input}`);
      const transcript = await readTranscript(input);
      const run = await refiner.process(transcript.text, model, {
        ...refineOptions,
        abortSignal,
      });
      await writeTranscript(output, { text: run.text, bom: transcript.bom });

      return {
        input,
        output,
        status: run.stats.incomplete ? 'incomplete' : 'refined',
        stats: run.stats,
      };
    } catch (error) {
      logger.error(`[BatchRunner] Failed to refine ${input}:`, error);
      return {
        input,
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

/**
 * One line per file for the command summary
 */
export function formatBatchSummary(results: readonly BatchFileResult[]): string {
  return results
    .map((result) => {
      switch (result.status) {
        case 'failed':
          return `✗ ${result.input}: ${result.error ?? 'unknown error'}`;
        case 'skipped':
          return `- ${result.input}: skipped`;
        default: {
          const stats = result.stats;
          const quality =
            stats && stats.quality.warnings > 0
              ? `, ${stats.quality.warnings} quality warnings`
              : '';
          const details = stats
            ? ` (${stats.chunksProcessed}/${stats.chunksTotal} chunks, ${stats.fallbacksTriggered} fallbacks, ${stats.correctionsApplied} corrections${quality}${stats.degraded ? ', degraded' : ''})`
            : '';
          const marker = result.status === 'incomplete' ? ' [incomplete]' : '';
          return `✓ ${result.input} → ${result.output ?? ''}${marker}${details}`;
        }
      }
    })
    .join('\n');
}
