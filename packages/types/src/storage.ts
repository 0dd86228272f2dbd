/**
 * ChunkStorageインターフェイス
 */

import type { Chunk } from './chunk.js';
import type { DocumentRecord } from './document.js';

/**
 * 保存済みチャンク
 */
export type StoredChunk = Chunk & {
  /** chunkDocumentの出力内での順序 */
  position: number;
  /** 保存日時 */
  storedAt: Date;
};

/**
 * 挿入結果
 */
export interface InsertResult {
  /** 新たに書き込んだ件数 */
  inserted: number;
  /** 既存のため書き込まなかった件数 */
  skipped: number;
}

export interface ChunkStorage {
  /**
   * チャンクを挿入（chunkIdが既存なら上書きせずスキップ）
   */
  insertChunks(chunks: Chunk[]): Promise<InsertResult>;

  /**
   * チャンクを取得
   */
  getChunk(documentId: string, chunkId: string): Promise<StoredChunk | null>;

  /**
   * 文書のチャンクを出力順に取得
   */
  listChunks(documentId: string): Promise<StoredChunk[]>;

  /**
   * 文書レコードを保存（既存なら何もしない）
   * @returns 書き込んだ場合true
   */
  saveDocument(record: DocumentRecord): Promise<boolean>;

  /**
   * 文書レコードを取得
   */
  getDocument(documentId: string): Promise<DocumentRecord | null>;

  /**
   * 文書とそのチャンクを削除
   */
  deleteDocument(documentId: string): Promise<void>;

  /**
   * すべての文書IDを取得
   */
  listDocuments(): Promise<string[]>;
}
