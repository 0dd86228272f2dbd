/**
 * 文書データの型定義
 */

/**
 * 目次の1項目
 */
export interface TocEntry {
  /** 見出しレベル */
  level: number;
  /** 見出しテキスト */
  title: string;
  /** ルートからのタイトル列 */
  path: string[];
}

/**
 * 取り込み済み文書のレコード
 */
export interface DocumentRecord {
  /** 文書ID（チャンクIDの入力になるため実行間で安定していること） */
  documentId: string;
  /** タイトル（最初の見出し、なければ文書ID） */
  title: string;
  /** 最初の見出しより前の前文 */
  abstract: string;
  /** 目次 */
  toc: TocEntry[];
  /** 元ファイルのパス（任意） */
  sourcePath?: string;
  /** 作成日時 */
  createdAt: Date;
}
