#!/usr/bin/env node
import { createConsoleLogger } from '@refinaria/logger';
import { TermDictionary } from '@refinaria/refiner';

import type { ParsedCommandLine } from './cli/parse-command-line';
import type { CommandContext } from './commands/command-context';

import { USAGE, parseCommandLine } from './cli/parse-command-line';
import { EXIT_FAILURE, EXIT_OK } from './commands/command-context';
import { runCompareCommand } from './commands/compare-command';
import { runCorrectCommand } from './commands/correct-command';
import { runRefineCommand } from './commands/refine-command';
import { loadEnv } from './config/load-env';
import { resolveConfig } from './config/refinaria-config';
import { ConfigError } from './errors/config-error';
import { checkModelAvailable } from './models/model-check';
import { createModel } from './models/model-factory';

const EXIT_USAGE = 2;

async function main(argv: readonly string[]): Promise<number> {
  let commandLine: ParsedCommandLine;
  try {
    commandLine = parseCommandLine(argv);
  } catch (error) {
    process.stderr.write(`${ConfigError.getErrorMessage(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (commandLine.command === 'help') {
    process.stdout.write(USAGE);
    return EXIT_OK;
  }

  loadEnv({ envFile: commandLine.envFile });
  const config = resolveConfig({
    configPath: commandLine.configPath,
    overrides: commandLine.overrides,
  });
  const logger = createConsoleLogger(config.logLevel);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, stopping after the current chunk');
    controller.abort();
  });

  const context: CommandContext = {
    logger,
    config,
    stdout: process.stdout,
    stderr: process.stderr,
    createModel: (modelId) => createModel(modelId),
    checkModel: (model, modelId) =>
      checkModelAvailable(model, modelId, {
        timeoutMs: config.timeoutMs,
        abortSignal: controller.signal,
      }),
    dictionary: TermDictionary.builtin(),
    abortSignal: controller.signal,
  };

  switch (commandLine.command) {
    case 'refine':
      return runRefineCommand(context, commandLine.files);
    case 'correct':
      return runCorrectCommand(context, commandLine.files, {
        write: commandLine.write,
      });
    case 'compare': {
      const [file] = commandLine.files;
      if (file === undefined || commandLine.models.length === 0) {
        process.stderr.write(`compare needs --models and one file\n\n${USAGE}`);
        return EXIT_USAGE;
      }
      return runCompareCommand(context, file, commandLine.models, {
        write: commandLine.write,
      });
    }
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${ConfigError.getErrorMessage(error)}\n`);
    process.exitCode = EXIT_FAILURE;
  },
);
