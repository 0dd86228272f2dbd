/**
 * ingest コマンド実装
 * 対象ファイルをチャンク化してストレージに保存する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { buildToc, extractAbstract, StructureParser, type Chunker } from '@doc-chunks/chunker';
import { ConfigLoader, type ChunkStorage, type DocumentRecord } from '@doc-chunks/types';
import { FileChunkStorage } from '@doc-chunks/storage';
import { applyChunkingOverrides, createChunker, type ChunkingOverrides } from '../utils/chunker.js';
import { FileDiscovery } from '../utils/file-discovery.js';
import {
  formatIngestFailure,
  formatIngestFileResult,
  formatIngestSummary,
  type IngestFailure,
  type IngestFileResult,
  type IngestReport,
} from '../utils/output.js';

const parser = new StructureParser();

export interface IngestCommandOptions extends ChunkingOverrides {
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * ファイルを検索してチャンクを保存
 *
 * 失敗したファイルはconsole.errorで報告して次のファイルへ進む
 * @param patterns 検索パターン（空なら設定のfiles.include）
 */
export async function ingestFiles(
  patterns: string[],
  options: IngestCommandOptions = {}
): Promise<IngestReport> {
  const cwd = options.cwd || process.cwd();
  const { config, projectRoot } = await ConfigLoader.resolve({ configPath: options.config, cwd });

  const chunker = createChunker(applyChunkingOverrides(config.chunking, options));
  const storage = new FileChunkStorage({
    basePath: path.resolve(projectRoot, config.storage.chunksPath),
  });
  const discovery = new FileDiscovery({ rootDir: projectRoot, config: config.files });

  const files = await discovery.findFiles(patterns);
  if (files.length === 0) {
    console.warn('No files matched.');
  }

  const report: IngestReport = { results: [], failures: [] };

  for (const file of files) {
    try {
      const result = await ingestFile(file, { projectRoot, chunker, storage });
      report.results.push(result);
      console.log(formatIngestFileResult(result));
    } catch (error) {
      const failure: IngestFailure = {
        documentId: file,
        message: error instanceof Error ? error.message : String(error),
      };
      report.failures.push(failure);
      console.error(formatIngestFailure(failure));
    }
  }

  return report;
}

/**
 * 1ファイルをチャンク化して文書レコードとチャンクを保存
 * 文書IDはプロジェクトルートからの相対パス
 */
async function ingestFile(
  file: string,
  context: { projectRoot: string; chunker: Chunker; storage: ChunkStorage }
): Promise<IngestFileResult> {
  const { projectRoot, chunker, storage } = context;
  const content = await fs.readFile(path.join(projectRoot, file), 'utf-8');
  const root = parser.parse(content);
  const chunks = chunker.chunkDocument(file, root);

  if (chunks.length === 0) {
    console.warn(`${file}: no chunks produced`);
  }

  const toc = buildToc(root);
  const record: DocumentRecord = {
    documentId: file,
    title: toc.length > 0 ? toc[0].title : file,
    abstract: extractAbstract(content),
    toc,
    sourcePath: file,
    createdAt: new Date(),
  };
  await storage.saveDocument(record);

  const { inserted, skipped } = await storage.insertChunks(chunks);
  return { documentId: file, chunks: chunks.length, inserted, skipped };
}

/**
 * ingest コマンドを実行
 */
export async function executeIngest(patterns: string[], options: IngestCommandOptions): Promise<void> {
  try {
    const report = await ingestFiles(patterns, options);
    console.log(formatIngestSummary(report));

    if (report.failures.length > 0) {
      process.exit(1);
    }
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
