/**
 * 出力フォーマットユーティリティ
 */

import type { Chunk } from '@doc-chunks/types';

/**
 * 取り込み結果（1ファイル分）
 */
export interface IngestFileResult {
  documentId: string;
  chunks: number;
  inserted: number;
  skipped: number;
}

/**
 * 取り込みに失敗したファイル
 */
export interface IngestFailure {
  documentId: string;
  message: string;
}

/**
 * 取り込み結果（全体）
 */
export interface IngestReport {
  results: IngestFileResult[];
  failures: IngestFailure[];
}

/**
 * チャンク列をJSON形式で出力
 */
export function formatChunksAsJson(chunks: Chunk[]): string {
  return JSON.stringify(chunks, null, 2);
}

/**
 * sectionPathを表示用に整形
 */
export function formatSectionPath(sectionPath: string[]): string {
  return sectionPath.length === 0 ? '(root)' : sectionPath.join(' > ');
}

/**
 * コンテンツのプレビューを取得（行ベース）
 */
function getPreviewContent(content: string, maxLines: number = 5): string {
  const lines = content.split('\n');

  if (lines.length <= maxLines) {
    return content;
  }

  const previewLines = lines.slice(0, maxLines);
  const remaining = lines.length - maxLines;
  previewLines.push(`... (残り${remaining}行)`);

  return previewLines.join('\n');
}

/**
 * チャンク列をテキスト形式で出力
 */
export function formatChunksAsText(chunks: Chunk[], previewLines: number = 5): string {
  if (chunks.length === 0) {
    return 'チャンク: 0件';
  }

  const totalTokens = chunks.reduce((sum, chunk) => sum + chunk.tokenCount, 0);
  const lines: string[] = [];
  lines.push(`チャンク: ${chunks.length}件（${totalTokens} tokens）\n`);

  chunks.forEach((chunk, index) => {
    // ヘッダー行
    lines.push(`${index + 1}. ${formatSectionPath(chunk.sectionPath)}`);

    const metaParts = [
      `Type: ${chunk.chunkType}`,
      `Tokens: ${chunk.tokenCount}`,
      `Paragraph: ${chunk.paragraphIndex}`,
    ];
    if (chunk.chunkType === 'split') {
      metaParts.push(`Window: ${chunk.subchunkIndex}`);
    }
    metaParts.push(`ID: ${chunk.chunkId}`);
    lines.push(metaParts.join(' | '));

    lines.push('');
    lines.push(getPreviewContent(chunk.text, previewLines));
    lines.push('');
  });

  return lines.join('\n');
}

/**
 * 取り込み結果の1行表示
 */
export function formatIngestFileResult(result: IngestFileResult): string {
  return `${result.documentId}: ${result.chunks} chunks (inserted ${result.inserted}, skipped ${result.skipped})`;
}

/**
 * 取り込み失敗の1行表示
 */
export function formatIngestFailure(failure: IngestFailure): string {
  return `${failure.documentId}: failed (${failure.message})`;
}

/**
 * 取り込み結果のサマリ
 */
export function formatIngestSummary(report: IngestReport): string {
  const inserted = report.results.reduce((sum, result) => sum + result.inserted, 0);
  const skipped = report.results.reduce((sum, result) => sum + result.skipped, 0);
  const files = report.results.length + report.failures.length;
  return `Files: ${files}, inserted: ${inserted}, skipped: ${skipped}, failed: ${report.failures.length}`;
}
