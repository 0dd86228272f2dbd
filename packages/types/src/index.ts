/**
 * @doc-chunks/types
 * doc-chunksの共通型定義
 */

// Section
export type { Section } from './section.js';
export { ROOT_SECTION_TITLE } from './section.js';

// Chunk
export type {
  Chunk,
  ChunkType,
  ParagraphChunk,
  MergedChunk,
  SplitChunk,
  ChunkingPolicy,
  Tokenizer,
} from './chunk.js';
export { CHUNK_ID_LENGTH, CHUNK_ID_PATTERN } from './chunk.js';

// Document
export type { TocEntry, DocumentRecord } from './document.js';

// Config
export type {
  DocChunksConfig,
  ProjectConfig,
  FilesConfig,
  ChunkingConfig,
  StorageConfig,
  TokenizerKind,
} from './config.js';
export { DEFAULT_CONFIG, toChunkingPolicy } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  validateConfig,
  type ResolveConfigOptions,
  type PartialDocChunksConfig,
} from './config/index.js';

// Storage
export type { ChunkStorage, StoredChunk, InsertResult } from './storage.js';

// Errors
export { DocChunksError, getErrnoCode } from './errors.js';
