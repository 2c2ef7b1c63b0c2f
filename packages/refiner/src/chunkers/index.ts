export { SmartChunker } from './smart-chunker';
export { TextChunker } from './text-chunker';
export type {
  DeterministicChunkingMode,
  TextChunkerOptions,
} from './text-chunker';
