import { ROOT_SECTION_TITLE, type Section } from '@doc-chunks/types';

/**
 * ATX形式の見出し行（前後の空白を除いた行に対して適用）
 */
export const HEADER_PATTERN = /^(#+)\s+(.*)$/;

/**
 * 構築中のセクション（パース完了後はSectionとして読み取り専用で扱う）
 */
interface SectionNode {
  title: string;
  level: number;
  path: string[];
  content: string[];
  subsections: SectionNode[];
}

function createNode(title: string, level: number, path: string[]): SectionNode {
  return { title, level, path, content: [], subsections: [] };
}

/**
 * 溜めた行を1段落として追加（空なら何もしない）
 */
function appendParagraph(section: SectionNode, lines: readonly string[]): void {
  const paragraph = lines.join(' ').trim();
  if (paragraph) {
    section.content.push(paragraph);
  }
}

/**
 * 見出しと段落からなるテキストをセクション木に変換するクラス
 */
export class StructureParser {
  /**
   * テキストをパース
   * @param rawText ATX見出し付きの構造化テキスト
   * @returns ルートセクション（level 0、path []）
   */
  parse(rawText: string): Section {
    const root = createNode(ROOT_SECTION_TITLE, 0, []);
    // 開いているセクションのスタック（先頭は常にルート）
    const stack: SectionNode[] = [root];
    let current = root;
    let pendingLines: string[] = [];

    for (const line of rawText.split('\n')) {
      const trimmed = line.trim();

      if (!trimmed) {
        // 空行で段落を確定
        appendParagraph(current, pendingLines);
        pendingLines = [];
        continue;
      }

      const header = HEADER_PATTERN.exec(trimmed);
      if (!header) {
        pendingLines.push(trimmed);
        continue;
      }

      appendParagraph(current, pendingLines);
      pendingLines = [];

      const level = header[1].length;
      const title = header[2].trim();

      // 新しい見出し以上のレベルを閉じる（レベルの飛びは許容）
      while (stack.length > 1 && stack[stack.length - 1].level >= level) {
        stack.pop();
      }

      const parent = stack[stack.length - 1];
      const section = createNode(title, level, [...parent.path, title]);
      parent.subsections.push(section);
      stack.push(section);
      current = section;
    }

    appendParagraph(current, pendingLines);

    return root;
  }
}
