import { TranscriptRefiner } from '@refinaria/refiner';
import * as path from 'node:path';

import type { ComparisonReport, ModelComparison } from '../compare/compare-report';
import type { CommandContext } from './command-context';

import { toRefineOptions } from '../batch/refine-options';
import {
  buildComparisonReport,
  formatComparisonReport,
  measureRun,
} from '../compare/compare-report';
import { readTranscript, writeTranscript } from '../io/transcript-files';
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK } from './command-context';

export interface CompareOptions {
  /** Write each model's output to the output directory */
  write?: boolean;
}

/**
 * `refined_<model>_<name>` with provider separators and tags flattened,
 * e.g. `refined_ollama_llama3.2_latest_aula.txt`
 */
export function comparisonOutputPath(
  outputDir: string,
  modelId: string,
  inputPath: string,
): string {
  const model = modelId.replace(/[:/]/g, '_');
  return path.join(outputDir, `refined_${model}_${path.basename(inputPath)}`);
}

/**
 * Runs the pipeline once per model on the same transcript, one model at a
 * time so elapsed times are comparable. A model that fails is reported and
 * the next one still runs.
 */
export async function compareModels(
  context: CommandContext,
  file: string,
  modelIds: readonly string[],
  options: CompareOptions = {},
): Promise<ComparisonReport> {
  const { logger, config, dictionary, abortSignal } = context;
  const transcript = await readTranscript(file);
  const correctedInput = dictionary.correct(transcript.text).corrected;
  const refiner = new TranscriptRefiner(logger, dictionary);
  const models: ModelComparison[] = [];

  for (const modelId of modelIds) {
    if (abortSignal?.aborted) {
      logger.warn(`Comparison cancelled before ${modelId}`);
      break;
    }

    logger.info(`Comparing ${modelId}`);
    try {
      const model = context.createModel(modelId);
      await context.checkModel(model, modelId);
      const startTime = Date.now();
      const run = await refiner.process(transcript.text, model, {
        ...toRefineOptions(config),
        abortSignal,
      });
      const measurement = measureRun({
        model: modelId,
        original: transcript.text,
        correctedInput,
        run,
        elapsedMs: Date.now() - startTime,
      });

      if (options.write) {
        const outputPath = comparisonOutputPath(config.output, modelId, file);
        await writeTranscript(outputPath, {
          text: run.text,
          bom: transcript.bom,
        });
        measurement.outputPath = outputPath;
      }
      models.push(measurement);
    } catch (error) {
      logger.error(`Comparison run failed for ${modelId}:`, error);
      models.push({
        model: modelId,
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return buildComparisonReport(file, transcript.text, models);
}

/**
 * `refinaria compare --models a,b <file>`
 */
export async function runCompareCommand(
  context: CommandContext,
  file: string,
  modelIds: readonly string[],
  options: CompareOptions = {},
): Promise<number> {
  const report = await compareModels(context, file, modelIds, options);
  context.stdout.write(`${formatComparisonReport(report)}\n`);

  if (report.models.some((entry) => entry.status === 'failed')) {
    return EXIT_FAILURE;
  }
  return context.abortSignal?.aborted ? EXIT_INTERRUPTED : EXIT_OK;
}
