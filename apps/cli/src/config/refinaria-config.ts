import type { LogLevel } from '@refinaria/logger';
import type { ChunkingMode } from '@refinaria/model';

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

import { ConfigError } from '../errors/config-error';

export const DEFAULT_CONFIG_FILE = 'refinaria.config.json';

/**
 * Fully resolved settings handed to the commands
 */
export interface RefinariaConfig {
  model: string;
  fallbackModel?: string;
  maxWordsPerChunk: number;
  chunkingMode: ChunkingMode;
  streaming: boolean;
  maxWorkers: number;
  input: string;
  output: string;
  maxRetries: number;
  retryDelayMs: number;
  contentLossThreshold: number;
  maxContentRatio: number;
  globalLossThreshold: number;
  contextWindowTokens: number;
  timeoutMs: number;
  temperature: number;
  cache: boolean;
  cacheDir: string;
  outputPrefix: string;
  /** Normalize line endings, spacing and hyphenated line breaks before correction */
  normalizeInput: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: RefinariaConfig = {
  model: 'ollama/llama3.2:latest',
  maxWordsPerChunk: 800,
  chunkingMode: 'paragraph-aware',
  streaming: true,
  maxWorkers: 1,
  input: 'input',
  output: 'output',
  maxRetries: 3,
  retryDelayMs: 2000,
  contentLossThreshold: 0.7,
  maxContentRatio: 2.0,
  globalLossThreshold: 0.5,
  contextWindowTokens: 8192,
  timeoutMs: 120_000,
  temperature: 0.1,
  cache: false,
  cacheDir: 'cache',
  outputPrefix: 'refined_',
  normalizeInput: false,
  logLevel: 'info',
};

const field = {
  model: z.string().trim().min(1),
  maxWordsPerChunk: z.number().int().positive(),
  chunkingMode: z.enum(['paragraph-aware', 'word-count', 'smart']),
  maxWorkers: z.number().int().positive(),
  path: z.string().trim().min(1),
  maxRetries: z.number().int().min(0),
  milliseconds: z.number().int().min(0),
  ratio: z.number().gt(0).max(1),
  maxContentRatio: z.number().gt(1),
  contextWindowTokens: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  outputPrefix: z.string().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
};

/**
 * Keys of `refinaria.config.json`
 */
export const configFileSchema = z
  .object({
    model: field.model.optional(),
    fallback_model: field.model.optional(),
    max_words_per_chunk: field.maxWordsPerChunk.optional(),
    chunking_mode: field.chunkingMode.optional(),
    streaming: z.boolean().optional(),
    no_streaming: z.boolean().optional(),
    max_workers: field.maxWorkers.optional(),
    input: field.path.optional(),
    output: field.path.optional(),
    max_retries: field.maxRetries.optional(),
    retry_delay_ms: field.milliseconds.optional(),
    content_loss_threshold: field.ratio.optional(),
    max_content_ratio: field.maxContentRatio.optional(),
    global_loss_threshold: field.ratio.optional(),
    context_window_tokens: field.contextWindowTokens.optional(),
    timeout_ms: field.timeoutMs.optional(),
    temperature: field.temperature.optional(),
    cache: z.boolean().optional(),
    cache_dir: field.path.optional(),
    output_prefix: field.outputPrefix.optional(),
    normalize_input: z.boolean().optional(),
    log_level: field.logLevel.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

const resolvedConfigSchema = z.object({
  model: field.model,
  fallbackModel: field.model.optional(),
  maxWordsPerChunk: field.maxWordsPerChunk,
  chunkingMode: field.chunkingMode,
  streaming: z.boolean(),
  maxWorkers: field.maxWorkers,
  input: field.path,
  output: field.path,
  maxRetries: field.maxRetries,
  retryDelayMs: field.milliseconds,
  contentLossThreshold: field.ratio,
  maxContentRatio: field.maxContentRatio,
  globalLossThreshold: field.ratio,
  contextWindowTokens: field.contextWindowTokens,
  timeoutMs: field.timeoutMs,
  temperature: field.temperature,
  cache: z.boolean(),
  cacheDir: field.path,
  outputPrefix: field.outputPrefix,
  normalizeInput: z.boolean(),
  logLevel: field.logLevel,
});

const environmentSchema = z.object({
  REFINARIA_MODEL: field.model.optional(),
  REFINARIA_FALLBACK_MODEL: field.model.optional(),
  REFINARIA_MAX_WORKERS: z.coerce.number().pipe(field.maxWorkers).optional(),
  REFINARIA_LOG_LEVEL: field.logLevel.optional(),
});

/**
 * Reads and validates a config file. A missing file yields an empty object
 * unless it is required.
 *
 * @throws ConfigError when the file is unreadable, not JSON or invalid
 */
export function readConfigFile(filePath: string, required = false): ConfigFile {
  if (!fs.existsSync(filePath)) {
    if (required) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw ConfigError.fromError(`Cannot read ${filePath}`, error);
  }

  const result = configFileSchema.safeParse(data);
  if (!result.success) {
    throw ConfigError.fromZodError(filePath, result.error);
  }
  return result.data;
}

export function fromConfigFile(file: ConfigFile): Partial<RefinariaConfig> {
  return {
    model: file.model,
    fallbackModel: file.fallback_model,
    maxWordsPerChunk: file.max_words_per_chunk,
    chunkingMode: file.chunking_mode,
    streaming:
      file.streaming ??
      (file.no_streaming === undefined ? undefined : !file.no_streaming),
    maxWorkers: file.max_workers,
    input: file.input,
    output: file.output,
    maxRetries: file.max_retries,
    retryDelayMs: file.retry_delay_ms,
    contentLossThreshold: file.content_loss_threshold,
    maxContentRatio: file.max_content_ratio,
    globalLossThreshold: file.global_loss_threshold,
    contextWindowTokens: file.context_window_tokens,
    timeoutMs: file.timeout_ms,
    temperature: file.temperature,
    cache: file.cache,
    cacheDir: file.cache_dir,
    outputPrefix: file.output_prefix,
    normalizeInput: file.normalize_input,
    logLevel: file.log_level,
  };
}

/**
 * Settings carried by `REFINARIA_*` variables; empty variables are ignored
 *
 * @throws ConfigError when a variable holds an invalid value
 */
export function fromEnvironment(
  env: NodeJS.ProcessEnv,
): Partial<RefinariaConfig> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = environmentSchema.safeParse(present);
  if (!result.success) {
    throw ConfigError.fromZodError('environment', result.error);
  }

  return {
    model: result.data.REFINARIA_MODEL,
    fallbackModel: result.data.REFINARIA_FALLBACK_MODEL,
    maxWorkers: result.data.REFINARIA_MAX_WORKERS,
    logLevel: result.data.REFINARIA_LOG_LEVEL,
  };
}

export interface ResolveConfigOptions {
  /**
   * Explicit config file; it must exist. Without it `refinaria.config.json`
   * in `cwd` is read when present.
   */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;

  /**
   * Values from command-line flags
   */
  overrides?: Partial<RefinariaConfig>;
}

/**
 * Defaults < config file < environment < flags
 *
 * @throws ConfigError when any layer holds an invalid value
 */
export function resolveConfig(
  options: ResolveConfigOptions = {},
): RefinariaConfig {
  const cwd = options.cwd ?? process.cwd();
  const file = options.configPath
    ? readConfigFile(path.resolve(cwd, options.configPath), true)
    : readConfigFile(path.resolve(cwd, DEFAULT_CONFIG_FILE));

  const layers = [
    options.overrides ?? {},
    fromEnvironment(options.env ?? process.env),
    fromConfigFile(file),
  ];
  const pick = <K extends keyof RefinariaConfig>(
    key: K,
  ): RefinariaConfig[K] =>
    layers.map((layer) => layer[key]).find((value) => value !== undefined) ??
    DEFAULT_CONFIG[key];

  const result = resolvedConfigSchema.safeParse({
    model: pick('model'),
    fallbackModel: pick('fallbackModel'),
    maxWordsPerChunk: pick('maxWordsPerChunk'),
    chunkingMode: pick('chunkingMode'),
    streaming: pick('streaming'),
    maxWorkers: pick('maxWorkers'),
    input: pick('input'),
    output: pick('output'),
    maxRetries: pick('maxRetries'),
    retryDelayMs: pick('retryDelayMs'),
    contentLossThreshold: pick('contentLossThreshold'),
    maxContentRatio: pick('maxContentRatio'),
    globalLossThreshold: pick('globalLossThreshold'),
    contextWindowTokens: pick('contextWindowTokens'),
    timeoutMs: pick('timeoutMs'),
    temperature: pick('temperature'),
    cache: pick('cache'),
    cacheDir: pick('cacheDir'),
    outputPrefix: pick('outputPrefix'),
    normalizeInput: pick('normalizeInput'),
    logLevel: pick('logLevel'),
  });
  if (!result.success) {
    throw ConfigError.fromZodError('command-line options', result.error);
  }
  return result.data;
}
