import type { CorrectionOutcome, TermSuggestion } from '@refinaria/model';

import type { CommandContext } from './command-context';

import {
  outputPathFor,
  readTranscript,
  writeTranscript,
} from '../io/transcript-files';
import { EXIT_FAILURE, EXIT_OK } from './command-context';
import { resolveInputs } from './resolve-inputs';

export const CORRECTED_PREFIX = 'corrected_';

export interface CorrectOptions {
  /** Write the corrected text as `<output>/corrected_<name>` */
  write?: boolean;
}

export function formatCorrections(
  file: string,
  outcome: CorrectionOutcome,
  suggestions: readonly TermSuggestion[],
): string {
  const lines = [`${file}: ${outcome.applied.length} corrections`];

  for (const correction of outcome.applied) {
    lines.push(
      `  ${correction.offset}: ${correction.original} → ${correction.replacement}`,
    );
  }
  for (const suggestion of suggestions) {
    lines.push(
      `  ${suggestion.offset}: ${suggestion.word} ~ ${suggestion.suggestion}? (${suggestion.similarity.toFixed(2)})`,
    );
  }

  return lines.join('\n');
}

/**
 * `refinaria correct [files...]`: dictionary pass only, no model
 */
export async function runCorrectCommand(
  context: CommandContext,
  files: readonly string[],
  options: CorrectOptions = {},
): Promise<number> {
  const { logger, config, dictionary, stdout } = context;
  const inputs = await resolveInputs(files, config.input);
  let failed = false;

  for (const file of inputs) {
    try {
      const transcript = await readTranscript(file);
      const outcome = dictionary.correct(transcript.text);
      const suggestions = dictionary.suggest(outcome.corrected);
      stdout.write(`${formatCorrections(file, outcome, suggestions)}\n`);

      if (options.write) {
        await writeTranscript(
          outputPathFor(file, config.output, CORRECTED_PREFIX),
          { text: outcome.corrected, bom: transcript.bom },
        );
      }
    } catch (error) {
      failed = true;
      logger.error(`Failed to correct ${file}:`, error);
    }
  }

  return failed ? EXIT_FAILURE : EXIT_OK;
}
