/**
 * チャンクデータの型定義
 *
 * Note: 永続化層ではchunkIdを主キーとして「存在しなければ挿入」する。
 * subchunkIndexの有無そのものがIDの入力になるため、split以外では
 * プロパティ自体を持たない
 */

export type ChunkType = 'paragraph' | 'merged' | 'split';

/** チャンクIDの長さ（16進文字数） */
export const CHUNK_ID_LENGTH = 16;

/** チャンクIDの形式 */
export const CHUNK_ID_PATTERN = new RegExp(`^[0-9a-f]{${CHUNK_ID_LENGTH}}$`);

interface ChunkBase {
  /** 文書IDと位置から導出した16桁の16進ID */
  chunkId: string;
  /** 元文書のID */
  documentId: string;
  /** チャンク本文 */
  text: string;
  /** トークナイザで計測したトークン数 */
  tokenCount: number;
  /** 所属セクションのpath（作成時点のコピー） */
  sectionPath: string[];
  /** セクション内の段落インデックス（mergedは先頭段落） */
  paragraphIndex: number;
}

/** 予算内の単一段落 */
export interface ParagraphChunk extends ChunkBase {
  chunkType: 'paragraph';
}

/** 小さな段落を1つ以上結合したもの */
export interface MergedChunk extends ChunkBase {
  chunkType: 'merged';
}

/** 長すぎる段落を文単位で分割したウィンドウの1つ */
export interface SplitChunk extends ChunkBase {
  chunkType: 'split';
  /** 段落内でのウィンドウ番号（0始まり） */
  subchunkIndex: number;
}

export type Chunk = ParagraphChunk | MergedChunk | SplitChunk;

/**
 * チャンク分割ポリシー（トークン閾値）
 */
export interface ChunkingPolicy {
  /** これ未満の段落は結合候補 */
  minTokens: number;
  /** 分割ウィンドウの目標トークン数 */
  targetTokens: number;
  /** 結合・単一段落の上限トークン数 */
  maxTokens: number;
  /** 分割ウィンドウ間で重複させる文の数 */
  sentenceOverlap: number;
}

/**
 * トークナイザ（ホストから注入される関数）
 * 並列に使う場合は再入可能であること
 */
export type Tokenizer = (text: string) => number;
