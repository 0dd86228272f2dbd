/**
 * @doc-chunks/chunker
 * 構造化テキストをトークン予算に沿ったチャンク列に変換する
 */

import type { Chunk, Section } from '@doc-chunks/types';

/**
 * Chunkerインターフェイス
 */
export interface Chunker {
  chunkDocument(documentId: string, root: Section): Chunk[];
  chunkText(documentId: string, rawText: string): Chunk[];
}

export { DocumentChunker, type DocumentChunkerOptions } from './document-chunker.js';
export { SectionChunker, type SectionChunkerOptions } from './section-chunker.js';
export { StructureParser, HEADER_PATTERN } from './structure-parser.js';
export { SentenceSegmenter } from './sentence-segmenter.js';
export { deriveChunkId } from './chunk-identity.js';
export { CHUNK_ID_LENGTH, CHUNK_ID_PATTERN } from '@doc-chunks/types';
export { DEFAULT_CHUNKING_POLICY, validateChunkingPolicy } from './policy.js';
export {
  TokenCounter,
  whitespaceTokenizer,
  gptTokenizer,
  createTokenizer,
} from './token-counter.js';
export { extractAbstract, buildToc } from './outline.js';
export { ChunkingConfigError, TokenizerError } from './errors.js';
