/**
 * 設定ファイルの型定義
 */

import type { ChunkingPolicy } from './chunk.js';

export interface DocChunksConfig {
  version: string;
  project: ProjectConfig;
  files: FilesConfig;
  chunking: ChunkingConfig;
  storage: StorageConfig;
}

export interface ProjectConfig {
  /** プロジェクト名 */
  name: string;
  /** プロジェクトルート */
  root: string;
}

export interface FilesConfig {
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
}

/** トークナイザの種類 */
export type TokenizerKind = 'whitespace' | 'gpt';

export interface ChunkingConfig extends ChunkingPolicy {
  /** 使用するトークナイザ */
  tokenizer: TokenizerKind;
}

export interface StorageConfig {
  /** チャンクの保存パス */
  chunksPath: string;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: DocChunksConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  files: {
    include: ['**/*.md'],
    exclude: ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/build/**'],
  },
  chunking: {
    minTokens: 80,
    targetTokens: 220,
    maxTokens: 300,
    sentenceOverlap: 1,
    tokenizer: 'whitespace',
  },
  storage: {
    chunksPath: '.doc-chunks/chunks',
  },
};

/**
 * 設定からエンジン用のポリシーを取り出す
 */
export function toChunkingPolicy(chunking: ChunkingConfig): ChunkingPolicy {
  return {
    minTokens: chunking.minTokens,
    targetTokens: chunking.targetTokens,
    maxTokens: chunking.maxTokens,
    sentenceOverlap: chunking.sentenceOverlap,
  };
}
