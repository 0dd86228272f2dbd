/**
 * 設定からチャンカーを組み立てるユーティリティ
 */

import { DocumentChunker, createTokenizer, type Chunker } from '@doc-chunks/chunker';
import { toChunkingPolicy, type ChunkingConfig, type TokenizerKind } from '@doc-chunks/types';

/**
 * コマンドラインから渡されるチャンク設定の上書き（文字列のまま）
 */
export interface ChunkingOverrides {
  min?: string;
  target?: string;
  max?: string;
  overlap?: string;
  tokenizer?: string;
}

const TOKENIZER_KINDS: readonly TokenizerKind[] = ['whitespace', 'gpt'];

function isTokenizerKind(value: string): value is TokenizerKind {
  return TOKENIZER_KINDS.some((kind) => kind === value);
}

/**
 * 整数オプションを解釈
 */
function parseIntegerOption(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new Error(`--${name} must be an integer (got "${value}")`);
  }
  return parseInt(value, 10);
}

/**
 * 設定値にコマンドラインの上書きを適用
 */
export function applyChunkingOverrides(
  chunking: ChunkingConfig,
  overrides: ChunkingOverrides
): ChunkingConfig {
  let tokenizer = chunking.tokenizer;
  if (overrides.tokenizer !== undefined) {
    if (!isTokenizerKind(overrides.tokenizer)) {
      throw new Error(
        `--tokenizer must be one of ${TOKENIZER_KINDS.join(', ')} (got "${overrides.tokenizer}")`
      );
    }
    tokenizer = overrides.tokenizer;
  }

  return {
    minTokens: parseIntegerOption('min', overrides.min, chunking.minTokens),
    targetTokens: parseIntegerOption('target', overrides.target, chunking.targetTokens),
    maxTokens: parseIntegerOption('max', overrides.max, chunking.maxTokens),
    sentenceOverlap: parseIntegerOption('overlap', overrides.overlap, chunking.sentenceOverlap),
    tokenizer,
  };
}

/**
 * チャンク設定からチャンカーを生成（閾値が不正ならChunkingConfigError）
 */
export function createChunker(chunking: ChunkingConfig): Chunker {
  return new DocumentChunker({
    policy: toChunkingPolicy(chunking),
    tokenizer: createTokenizer(chunking.tokenizer),
  });
}
