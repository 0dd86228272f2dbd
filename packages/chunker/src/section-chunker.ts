import type {
  Chunk,
  ChunkingPolicy,
  MergedChunk,
  ParagraphChunk,
  Section,
  SplitChunk,
  Tokenizer,
} from '@doc-chunks/types';
import { deriveChunkId } from './chunk-identity.js';
import { DEFAULT_CHUNKING_POLICY, validateChunkingPolicy } from './policy.js';
import { SentenceSegmenter } from './sentence-segmenter.js';
import { TokenCounter, whitespaceTokenizer } from './token-counter.js';

export interface SectionChunkerOptions {
  /** 閾値（未指定の項目はデフォルト） */
  policy?: Partial<ChunkingPolicy>;
  /** トークナイザ（デフォルト: 空白区切り） */
  tokenizer?: Tokenizer;
  /** 文分割器 */
  segmenter?: SentenceSegmenter;
}

/**
 * 結合待ちの小さな段落
 */
interface MergeBuffer {
  readonly text: string;
  /** 最初に取り込んだ段落のインデックス */
  readonly firstIndex: number;
}

/**
 * 段落1つを処理した結果
 */
interface StepResult {
  readonly buffer: MergeBuffer | null;
  readonly emitted: Chunk[];
}

/** 結合時の段落区切り */
const PARAGRAPH_SEPARATOR = '\n\n';

/**
 * 1セクション直下の段落を、閾値に従って結合・分割するクラス
 *
 * - minTokens未満の段落はmaxTokensを超えない範囲で結合する（merged）
 * - minTokens以上maxTokens以下の段落はそのまま1チャンク（paragraph）
 * - maxTokensを超える段落は文単位のウィンドウに分割する（split）
 */
export class SectionChunker {
  readonly policy: Readonly<ChunkingPolicy>;
  private readonly tokenCounter: TokenCounter;
  private readonly segmenter: SentenceSegmenter;

  constructor(options: SectionChunkerOptions = {}) {
    this.policy = validateChunkingPolicy({ ...DEFAULT_CHUNKING_POLICY, ...options.policy });
    this.tokenCounter = new TokenCounter(options.tokenizer ?? whitespaceTokenizer);
    this.segmenter = options.segmenter ?? new SentenceSegmenter();
  }

  /**
   * セクション直下の段落をチャンク化（子セクションは対象外）
   */
  chunkSection(documentId: string, section: Section): Chunk[] {
    const chunks: Chunk[] = [];
    let buffer: MergeBuffer | null = null;

    for (const [index, paragraph] of section.content.entries()) {
      const step = this.acceptParagraph(documentId, section, buffer, paragraph, index);
      chunks.push(...step.emitted);
      buffer = step.buffer;
    }

    if (buffer) {
      chunks.push(this.flush(documentId, section, buffer));
    }

    return chunks;
  }

  /**
   * 長すぎる段落を文単位のウィンドウに分割
   *
   * ウィンドウは合計がtargetTokensに達するまで文を足す。文の途中では切らないため
   * maxTokensを超えるウィンドウもあり得る
   */
  splitParagraph(
    documentId: string,
    section: Section,
    text: string,
    paragraphIndex: number
  ): SplitChunk[] {
    const sentences = this.segmenter.segment(text);
    const counts = sentences.map((sentence) => this.tokenCounter.count(sentence));
    const chunks: SplitChunk[] = [];

    let cursor = 0;
    let subchunkIndex = 0;

    while (cursor < sentences.length) {
      const start = cursor;
      let tokenSum = 0;

      while (cursor < sentences.length) {
        tokenSum += counts[cursor];
        cursor++;
        if (tokenSum >= this.policy.targetTokens) {
          break;
        }
      }

      chunks.push({
        chunkId: deriveChunkId(documentId, section.path, paragraphIndex, subchunkIndex),
        documentId,
        text: sentences.slice(start, cursor).join(' '),
        tokenCount: tokenSum,
        chunkType: 'split',
        sectionPath: [...section.path],
        paragraphIndex,
        subchunkIndex,
      });
      subchunkIndex++;

      // 残りがある場合のみ戻る。ウィンドウ長-1を上限にして必ず前進させる
      if (cursor < sentences.length) {
        const windowSize = cursor - start;
        cursor -= Math.min(this.policy.sentenceOverlap, windowSize - 1);
      }
    }

    return chunks;
  }

  /**
   * 段落を1つ受け取り、次のバッファと確定したチャンクを返す
   */
  private acceptParagraph(
    documentId: string,
    section: Section,
    buffer: MergeBuffer | null,
    paragraph: string,
    index: number
  ): StepResult {
    const tokens = this.tokenCounter.count(paragraph);

    if (tokens < this.policy.minTokens) {
      if (!buffer) {
        return { buffer: { text: paragraph, firstIndex: index }, emitted: [] };
      }

      const candidate = buffer.text + PARAGRAPH_SEPARATOR + paragraph;
      if (this.tokenCounter.count(candidate) <= this.policy.maxTokens) {
        return { buffer: { text: candidate, firstIndex: buffer.firstIndex }, emitted: [] };
      }

      return {
        buffer: { text: paragraph, firstIndex: index },
        emitted: [this.flush(documentId, section, buffer)],
      };
    }

    // minTokens以上の段落はバッファに取り込まない
    const emitted: Chunk[] = buffer ? [this.flush(documentId, section, buffer)] : [];

    if (tokens <= this.policy.maxTokens) {
      emitted.push(this.paragraphChunk(documentId, section, paragraph, tokens, index));
    } else {
      emitted.push(...this.splitParagraph(documentId, section, paragraph, index));
    }

    return { buffer: null, emitted };
  }

  /**
   * バッファをmergedチャンクとして確定（トークン数は再計測）
   */
  private flush(documentId: string, section: Section, buffer: MergeBuffer): MergedChunk {
    return {
      chunkId: deriveChunkId(documentId, section.path, buffer.firstIndex),
      documentId,
      text: buffer.text,
      tokenCount: this.tokenCounter.count(buffer.text),
      chunkType: 'merged',
      sectionPath: [...section.path],
      paragraphIndex: buffer.firstIndex,
    };
  }

  private paragraphChunk(
    documentId: string,
    section: Section,
    text: string,
    tokenCount: number,
    paragraphIndex: number
  ): ParagraphChunk {
    return {
      chunkId: deriveChunkId(documentId, section.path, paragraphIndex),
      documentId,
      text,
      tokenCount,
      chunkType: 'paragraph',
      sectionPath: [...section.path],
      paragraphIndex,
    };
  }
}
