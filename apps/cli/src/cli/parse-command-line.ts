import type { ChunkingMode } from '@refinaria/model';

import { parseArgs } from 'node:util';

import type { RefinariaConfig } from '../config/refinaria-config';

import { ConfigError } from '../errors/config-error';

export const COMMANDS = ['refine', 'compare', 'correct', 'help'] as const;

export type CommandName = (typeof COMMANDS)[number];

const CHUNKING_MODES: readonly ChunkingMode[] = [
  'paragraph-aware',
  'word-count',
  'smart',
];

export const USAGE = `Usage: refinaria [command] [options] [files...]

Commands:
  refine [files...]           Refine transcripts (default; every .txt of the input directory without files)
  compare --models a,b <file> Refine one file with several models and compare them
  correct [files...]          Apply the term dictionary only
  help                        Show this message

Options:
  -c, --config <path>         Config file (default: refinaria.config.json when present)
      --env-file <path>       Env file loaded before anything else
  -m, --model <id>            Model, e.g. ollama/llama3.2:latest or openai/gpt-4o-mini
      --fallback-model <id>   Model used when the primary one fails
  -w, --words <n>             Maximum words per chunk
      --mode <mode>           paragraph-aware, word-count or smart
  -j, --workers <n>           Files refined in parallel
  -i, --input <dir>           Input directory
  -o, --output <dir>          Output directory
      --prefix <text>         Output file name prefix
      --normalize             Normalize line endings and spacing before correction
      --no-stream             Do not stream model output
      --cache                 Reuse refinements from the cache directory
      --cache-dir <dir>       Cache directory
      --models <ids>          Comma-separated models for compare
      --write                 Write compare or correct output files
  -v, --verbose               Debug logging
  -q, --quiet                 Errors only
  -h, --help                  Show this message
`;

export interface ParsedCommandLine {
  command: CommandName;
  files: string[];
  configPath?: string;
  envFile?: string;
  models: string[];
  write: boolean;
  overrides: Partial<RefinariaConfig>;
}

function isCommand(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function isChunkingMode(value: string): value is ChunkingMode {
  return CHUNKING_MODES.some((mode) => mode === value);
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      'env-file': { type: 'string' },
      model: { type: 'string', short: 'm' },
      'fallback-model': { type: 'string' },
      words: { type: 'string', short: 'w' },
      mode: { type: 'string' },
      workers: { type: 'string', short: 'j' },
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      prefix: { type: 'string' },
      normalize: { type: 'boolean' },
      'no-stream': { type: 'boolean' },
      cache: { type: 'boolean' },
      'cache-dir': { type: 'string' },
      models: { type: 'string' },
      write: { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      quiet: { type: 'boolean', short: 'q' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/**
 * Parses `argv` (without the node and script entries). Numeric flags are
 * validated later with the rest of the configuration.
 *
 * @throws ConfigError on unknown flags or an unknown chunking mode
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommandLine {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw ConfigError.fromError('Invalid command line', error);
  }

  const { values, positionals } = parsed;
  const [first, ...rest] = positionals;
  const explicit = first !== undefined && isCommand(first);
  const command: CommandName = values.help
    ? 'help'
    : explicit
      ? first
      : 'refine';
  const files = explicit ? rest : positionals;

  let chunkingMode: ChunkingMode | undefined;
  if (values.mode !== undefined) {
    if (!isChunkingMode(values.mode)) {
      throw new ConfigError(
        `Unknown chunking mode "${values.mode}", expected one of: ${CHUNKING_MODES.join(', ')}`,
      );
    }
    chunkingMode = values.mode;
  }

  const overrides: Partial<RefinariaConfig> = {
    model: values.model,
    fallbackModel: values['fallback-model'],
    maxWordsPerChunk: toNumber(values.words),
    chunkingMode,
    maxWorkers: toNumber(values.workers),
    input: values.input,
    output: values.output,
    outputPrefix: values.prefix,
    normalizeInput: values.normalize,
    streaming: values['no-stream'] ? false : undefined,
    cache: values.cache,
    cacheDir: values['cache-dir'],
    logLevel: values.verbose ? 'debug' : values.quiet ? 'error' : undefined,
  };

  return {
    command,
    files,
    configPath: values.config,
    envFile: values['env-file'],
    models: (values.models ?? '')
      .split(',')
      .map((model) => model.trim())
      .filter((model) => model.length > 0),
    write: values.write ?? false,
    overrides,
  };
}
