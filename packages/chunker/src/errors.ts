/**
 * チャンカーのエラー定義
 */

import { DocChunksError } from '@doc-chunks/types';

/**
 * 閾値の組み合わせが不正（構築時に即座に投げる。値の補正はしない）
 */
export class ChunkingConfigError extends DocChunksError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ChunkingConfigError';
  }
}

/**
 * トークナイザが非負整数以外を返した
 * トークナイザ自身が投げた例外はラップせずにそのまま伝播させる
 */
export class TokenizerError extends DocChunksError {
  constructor(
    message: string,
    public readonly received: unknown
  ) {
    super(message, 'TOKENIZER_ERROR');
    this.name = 'TokenizerError';
  }
}
