import { createHash } from 'node:crypto';
import { CHUNK_ID_LENGTH } from '@doc-chunks/types';

/** セクションpathの区切り（見出しに現れない制御文字） */
const PATH_SEPARATOR = '\u001f';
/** フィールドの区切り */
const FIELD_SEPARATOR = '\u001e';

/**
 * 文書IDと位置からチャンクIDを導出
 *
 * MD5の先頭16桁（64bit）に切り詰める。衝突の可能性は許容している
 * subchunkIndexが未指定の場合と0の場合は別のIDになる
 */
export function deriveChunkId(
  documentId: string,
  sectionPath: readonly string[],
  paragraphIndex: number,
  subchunkIndex?: number
): string {
  const key = [
    documentId,
    sectionPath.join(PATH_SEPARATOR),
    String(paragraphIndex),
    subchunkIndex === undefined ? '' : String(subchunkIndex),
  ].join(FIELD_SEPARATOR);

  return createHash('md5').update(key, 'utf8').digest('hex').slice(0, CHUNK_ID_LENGTH);
}
