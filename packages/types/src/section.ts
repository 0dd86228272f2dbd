/**
 * セクションデータの型定義
 *
 * 見出し（ATX形式）から構築される文書のアウトライン木のノード。
 * パース後は変更しない（readonly）
 */

/** ルートセクションの予約タイトル */
export const ROOT_SECTION_TITLE = '';

export interface Section {
  /** 見出しテキスト（ルートは空文字列） */
  readonly title: string;
  /** 階層レベル（ルート=0、`##` なら2） */
  readonly level: number;
  /** ルートを除いた祖先から自身までのタイトル列 */
  readonly path: readonly string[];
  /** このセクション直下の段落（子セクションの段落は含まない） */
  readonly content: readonly string[];
  /** 子セクション（文書内の順序） */
  readonly subsections: readonly Section[];
}
