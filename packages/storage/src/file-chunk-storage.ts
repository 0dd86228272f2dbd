/**
 * ファイルベースのChunkStorage実装
 */

import { promises as fs } from 'node:fs';
import { join, normalize } from 'node:path';
import { createHash } from 'node:crypto';
import type { ZodType } from 'zod';
import {
  CHUNK_ID_PATTERN,
  DocChunksError,
  getErrnoCode,
  type Chunk,
  type ChunkStorage,
  type DocumentRecord,
  type InsertResult,
  type StoredChunk,
} from '@doc-chunks/types';
import { documentRecordSchema, storedChunkSchema } from './record-schema.js';

export interface FileChunkStorageOptions {
  /** ストレージのベースディレクトリ */
  basePath: string;
}

/**
 * 保存済みファイルの内容が不正
 */
export class StorageFormatError extends DocChunksError {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message, 'STORAGE_FORMAT_ERROR');
    this.name = 'StorageFormatError';
  }
}

const DOCUMENT_FILE = 'document.json';
const CHUNKS_DIR = 'chunks';

/**
 * ファイルベースのChunkStorage
 *
 * 文書ごとのディレクトリにJSONで保存する:
 *   <basePath>/<文書IDのハッシュ>/document.json
 *   <basePath>/<文書IDのハッシュ>/chunks/<chunkId>.json
 * 書き込みは排他的作成（wx）で行い、既存ファイルは上書きしない
 */
export class FileChunkStorage implements ChunkStorage {
  private basePath: string;

  constructor(options: FileChunkStorageOptions) {
    this.basePath = normalize(options.basePath);
  }

  /**
   * チャンクを挿入（既存のchunkIdはスキップ）
   * positionは渡された配列内の順序
   */
  async insertChunks(chunks: Chunk[]): Promise<InsertResult> {
    const result: InsertResult = { inserted: 0, skipped: 0 };
    const storedAt = new Date();

    for (const [position, chunk] of chunks.entries()) {
      const dir = join(this.getDocumentDir(chunk.documentId), CHUNKS_DIR);
      await fs.mkdir(dir, { recursive: true });

      const record: StoredChunk = { ...chunk, position, storedAt };
      const written = await this.writeIfAbsent(join(dir, `${chunk.chunkId}.json`), record);

      if (written) {
        result.inserted++;
      } else {
        result.skipped++;
      }
    }

    return result;
  }

  /**
   * チャンクを取得
   */
  async getChunk(documentId: string, chunkId: string): Promise<StoredChunk | null> {
    // chunkIdはファイル名になるため形式を確認
    if (!CHUNK_ID_PATTERN.test(chunkId)) {
      return null;
    }

    const filePath = join(this.getDocumentDir(documentId), CHUNKS_DIR, `${chunkId}.json`);
    return this.readRecord(filePath, storedChunkSchema);
  }

  /**
   * 文書のチャンクを出力順に取得
   */
  async listChunks(documentId: string): Promise<StoredChunk[]> {
    const dir = join(this.getDocumentDir(documentId), CHUNKS_DIR);
    const fileNames = await this.readDirectory(dir);
    const chunks: StoredChunk[] = [];

    for (const fileName of fileNames) {
      if (!fileName.endsWith('.json')) {
        continue;
      }
      const chunk = await this.readRecord(join(dir, fileName), storedChunkSchema);
      if (chunk) {
        chunks.push(chunk);
      }
    }

    return chunks.sort((a, b) => a.position - b.position);
  }

  /**
   * 文書レコードを保存（既存なら何もしない）
   */
  async saveDocument(record: DocumentRecord): Promise<boolean> {
    const dir = this.getDocumentDir(record.documentId);
    await fs.mkdir(dir, { recursive: true });

    return this.writeIfAbsent(join(dir, DOCUMENT_FILE), record);
  }

  /**
   * 文書レコードを取得
   */
  async getDocument(documentId: string): Promise<DocumentRecord | null> {
    return this.readRecord(join(this.getDocumentDir(documentId), DOCUMENT_FILE), documentRecordSchema);
  }

  /**
   * 文書とそのチャンクを削除
   */
  async deleteDocument(documentId: string): Promise<void> {
    await fs.rm(this.getDocumentDir(documentId), { recursive: true, force: true });
  }

  /**
   * 文書レコードを持つすべての文書IDを取得
   */
  async listDocuments(): Promise<string[]> {
    const entries = await this.readDirectory(this.basePath);
    const documentIds: string[] = [];

    for (const entry of entries) {
      const record = await this.readRecord(
        join(this.basePath, entry, DOCUMENT_FILE),
        documentRecordSchema
      );
      if (record) {
        documentIds.push(record.documentId);
      }
    }

    return documentIds.sort();
  }

  /**
   * 文書IDからディレクトリを決める（IDにパス区切りなどが含まれてもよいようハッシュ化）
   */
  private getDocumentDir(documentId: string): string {
    return join(this.basePath, this.calculateHash(documentId).slice(0, 16));
  }

  /**
   * 排他的作成で書き込む
   * @returns 書き込んだ場合true、既に存在した場合false
   */
  private async writeIfAbsent(filePath: string, value: unknown): Promise<boolean> {
    try {
      await fs.writeFile(filePath, JSON.stringify(value, null, 2), { encoding: 'utf-8', flag: 'wx' });
      return true;
    } catch (error) {
      if (getErrnoCode(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  /**
   * JSONレコードを読み込んで検証（存在しなければnull）
   */
  private async readRecord<T>(filePath: string, schema: ZodType<T>): Promise<T | null> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const code = getErrnoCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StorageFormatError(
        `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        filePath
      );
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new StorageFormatError(`Invalid record in ${filePath}: ${result.error.message}`, filePath);
    }
    return result.data;
  }

  /**
   * ディレクトリのエントリ名を取得（存在しなければ空配列）
   */
  private async readDirectory(dir: string): Promise<string[]> {
    try {
      return await fs.readdir(dir);
    } catch (error) {
      if (getErrnoCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  /**
   * 文字列のハッシュを計算
   */
  private calculateHash(content: string): string {
    return createHash('sha256').update(content).digest('hex');
  }
}
