import { encode } from 'gpt-tokenizer';
import type { Tokenizer, TokenizerKind } from '@doc-chunks/types';
import { TokenizerError } from './errors.js';

/**
 * 空白区切りの単語数をトークン数とみなす
 */
export const whitespaceTokenizer: Tokenizer = (text) => {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
};

/**
 * GPT系のBPEトークン数
 * 本文中の<|endoftext|>などの特殊トークン表記も通常のテキストとして数える
 */
export const gptTokenizer: Tokenizer = (text) => {
  return encode(text, { disallowedSpecial: new Set() }).length;
};

/**
 * 設定名からトークナイザを選ぶ
 */
export function createTokenizer(kind: TokenizerKind): Tokenizer {
  switch (kind) {
    case 'whitespace':
      return whitespaceTokenizer;
    case 'gpt':
      return gptTokenizer;
  }
}

/**
 * トークン数をカウントするクラス
 *
 * 注入されたトークナイザの戻り値を検証する。トークナイザが投げた例外は
 * 呼び出し元（文書単位の処理）までそのまま伝播させる
 */
export class TokenCounter {
  constructor(private readonly tokenizer: Tokenizer = whitespaceTokenizer) {}

  /**
   * テキストのトークン数を計測
   * @param text 計測するテキスト
   * @returns トークン数
   */
  count(text: string): number {
    const count = this.tokenizer(text);
    if (!Number.isInteger(count) || count < 0) {
      throw new TokenizerError(
        `Tokenizer must return a non-negative integer (got ${String(count)})`,
        count
      );
    }
    return count;
  }

  /**
   * 複数のテキストの合計トークン数を計測
   */
  countAll(texts: readonly string[]): number {
    return texts.reduce((sum, text) => sum + this.count(text), 0);
  }
}
