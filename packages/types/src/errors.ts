/**
 * 共通エラー定義
 */

/**
 * doc-chunksのエラー基底クラス
 */
export class DocChunksError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'DocChunksError';
  }
}

/**
 * Node.jsのシステムエラーからエラーコード（ENOENTなど）を取り出す
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
