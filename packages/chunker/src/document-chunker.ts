import type { Chunk, Section } from '@doc-chunks/types';
import { SectionChunker, type SectionChunkerOptions } from './section-chunker.js';
import { StructureParser } from './structure-parser.js';

export interface DocumentChunkerOptions extends SectionChunkerOptions {
  /** 構造パーサ */
  parser?: StructureParser;
}

/**
 * セクション木全体をチャンク化するクラス
 *
 * 各セクションの段落を先に、続いて子セクションを順に処理する（前順）。
 * セクションをまたいだ結合・分割は行わない。同期処理のみで、
 * 途中で例外が起きた場合は部分的な結果を返さない
 */
export class DocumentChunker {
  private readonly sectionChunker: SectionChunker;
  private readonly parser: StructureParser;

  constructor(options: DocumentChunkerOptions = {}) {
    this.sectionChunker = new SectionChunker(options);
    this.parser = options.parser ?? new StructureParser();
  }

  /**
   * セクション木をチャンク化
   * @param documentId 文書ID（実行間で安定していること）
   * @param root ルートセクション
   */
  chunkDocument(documentId: string, root: Section): Chunk[] {
    const chunks: Chunk[] = [];
    this.collect(documentId, root, chunks);
    return chunks;
  }

  /**
   * テキストをパースしてチャンク化
   */
  chunkText(documentId: string, rawText: string): Chunk[] {
    return this.chunkDocument(documentId, this.parser.parse(rawText));
  }

  private collect(documentId: string, section: Section, chunks: Chunk[]): void {
    chunks.push(...this.sectionChunker.chunkSection(documentId, section));

    for (const subsection of section.subsections) {
      this.collect(documentId, subsection, chunks);
    }
  }
}
