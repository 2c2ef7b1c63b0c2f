export { ConfigError } from './config-error';
export { TranscriptFileError } from './transcript-file-error';
