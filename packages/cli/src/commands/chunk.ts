/**
 * chunk コマンド実装
 * 1ファイルをチャンク化して出力する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, type Chunk } from '@doc-chunks/types';
import { applyChunkingOverrides, createChunker, type ChunkingOverrides } from '../utils/chunker.js';
import { formatChunksAsJson, formatChunksAsText } from '../utils/output.js';

export interface ChunkCommandOptions extends ChunkingOverrides {
  /** 文書ID（デフォルト: プロジェクトルートからの相対パス） */
  id?: string;
  format?: 'text' | 'json';
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * ファイルパスから文書IDを決める（区切りは常に/）
 */
export function toDocumentId(filePath: string, baseDir: string): string {
  return path.relative(baseDir, path.resolve(baseDir, filePath)).split(path.sep).join('/');
}

/**
 * ファイルをチャンク化
 */
export async function chunkFile(file: string, options: ChunkCommandOptions = {}): Promise<Chunk[]> {
  const cwd = options.cwd || process.cwd();
  const { config, projectRoot } = await ConfigLoader.resolve({ configPath: options.config, cwd });

  const chunker = createChunker(applyChunkingOverrides(config.chunking, options));
  const filePath = await fs.realpath(path.resolve(cwd, file));
  const content = await fs.readFile(filePath, 'utf-8');
  // ingestと同じくプロジェクトルートからの相対パスを文書IDにする
  const documentId = options.id ?? toDocumentId(filePath, projectRoot);

  return chunker.chunkText(documentId, content);
}

/**
 * chunk コマンドを実行
 */
export async function executeChunk(file: string, options: ChunkCommandOptions): Promise<void> {
  try {
    const chunks = await chunkFile(file, options);

    const format = options.format || 'text';
    const output = format === 'json' ? formatChunksAsJson(chunks) : formatChunksAsText(chunks);

    console.log(output);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
