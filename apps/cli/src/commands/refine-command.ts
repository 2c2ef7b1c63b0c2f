import type { LanguageModel } from 'ai';

import { TranscriptRefiner } from '@refinaria/refiner';

import type { BatchFileResult } from '../batch/batch-runner';
import type { CommandContext } from './command-context';

import { BatchRunner, formatBatchSummary } from '../batch/batch-runner';
import { toRefineOptions } from '../batch/refine-options';
import { FileRefinementCache } from '../cache/file-refinement-cache';
import {
  EXIT_FAILURE,
  EXIT_INTERRUPTED,
  EXIT_OK,
} from './command-context';
import { resolveInputs } from './resolve-inputs';

/**
 * `refinaria refine [files...]`
 */
export async function runRefineCommand(
  context: CommandContext,
  files: readonly string[],
): Promise<number> {
  const { logger, config, stdout, stderr, abortSignal } = context;
  const inputs = await resolveInputs(files, config.input);

  if (inputs.length === 0) {
    logger.warn(`No transcripts found in ${config.input}`);
    return EXIT_OK;
  }

  const model = context.createModel(config.model);
  await context.checkModel(model, config.model);

  let fallbackModel: LanguageModel | undefined;
  if (config.fallbackModel) {
    fallbackModel = context.createModel(config.fallbackModel);
    await context.checkModel(fallbackModel, config.fallbackModel);
  }
  // Streamed text from parallel files would interleave
  const streaming = config.streaming && config.maxWorkers === 1;

  const runner = new BatchRunner({
    logger,
    refiner: new TranscriptRefiner(logger, context.dictionary),
    model,
    refineOptions: {
      ...toRefineOptions(config),
      fallbackModel,
      cache: config.cache
        ? new FileRefinementCache(logger, config.cacheDir)
        : undefined,
      onTextDelta: streaming ? (delta) => stderr.write(delta) : undefined,
      onChunkRefined: (result, progress) => {
        if (streaming) {
          stderr.write('\n');
        }
        logger.info(
          `Chunk ${progress.completed}/${progress.total} ${result.finalState}${result.fromCache ? ' (cached)' : ''}`,
        );
      },
    },
    outputDir: config.output,
    outputPrefix: config.outputPrefix,
    maxWorkers: config.maxWorkers,
    abortSignal,
  });

  const results = await runner.run(inputs);
  stdout.write(`${formatBatchSummary(results)}\n`);

  return exitCodeFor(results, abortSignal);
}

export function exitCodeFor(
  results: readonly BatchFileResult[],
  abortSignal?: AbortSignal,
): number {
  if (results.some((result) => result.status === 'failed')) {
    return EXIT_FAILURE;
  }
  return abortSignal?.aborted ? EXIT_INTERRUPTED : EXIT_OK;
}
