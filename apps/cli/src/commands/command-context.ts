import type { LoggerMethods } from '@refinaria/logger';
import type { TermDictionary } from '@refinaria/refiner';
import type { LanguageModel } from 'ai';

import type { RefinariaConfig } from '../config/refinaria-config';

export interface OutputStream {
  write(text: string): unknown;
}

/**
 * Everything a command needs from the outside world
 */
export interface CommandContext {
  logger: LoggerMethods;
  config: RefinariaConfig;
  /** Command results; diagnostics go to the logger */
  stdout: OutputStream;
  /** Streamed model text */
  stderr: OutputStream;
  createModel: (modelId: string) => LanguageModel;
  /** Rejects with a ConfigError when the model does not answer */
  checkModel: (model: LanguageModel, modelId: string) => Promise<void>;
  dictionary: TermDictionary;
  abortSignal?: AbortSignal;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;
