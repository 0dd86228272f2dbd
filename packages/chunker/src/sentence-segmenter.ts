/**
 * 文末記号（. ! ?）直後の空白で区切る。ただし次の直後では区切らない
 * - `e.g.` `U.S.` のような「英数字.英数字.」
 * - `Dr.` `Mr.` のような大文字+小文字の略語
 * - `J. Smith` のような大文字1文字のイニシャル
 */
const SENTENCE_BOUNDARY = /(?<!\w\.\w.)(?<![A-Z][a-z]\.)(?<!\b[A-Z]\.)(?<=[.!?])\s/;

/**
 * ヒューリスティックな文分割
 *
 * 抑制規則にない略語（`etc.` など）では過剰に分割される。言語的な正確さは目指さない
 */
export class SentenceSegmenter {
  /**
   * テキストを文の配列に分割
   * @returns 前後の空白を除いた空でない文
   */
  segment(text: string): string[] {
    return text
      .split(SENTENCE_BOUNDARY)
      .map((sentence) => sentence.trim())
      .filter((sentence) => sentence.length > 0);
  }
}
