/**
 * 文書のアウトライン（前文・目次）
 */

import type { Section, TocEntry } from '@doc-chunks/types';
import { HEADER_PATTERN } from './structure-parser.js';

/** 前文の最大文字数 */
const ABSTRACT_MAX_LENGTH = 2000;
/** 前文がない場合に先頭から取る文字数 */
const ABSTRACT_FALLBACK_LENGTH = 1000;

/**
 * 最初の見出しより前の前文を取り出す
 * 前文がない（いきなり見出しで始まる）場合は先頭1000文字
 */
export function extractAbstract(rawText: string): string {
  const lines: string[] = [];

  for (const line of rawText.split('\n')) {
    if (HEADER_PATTERN.test(line.trim())) {
      break;
    }
    lines.push(line);
  }

  const abstract = lines.join('\n').trim();
  if (!abstract) {
    return rawText.slice(0, ABSTRACT_FALLBACK_LENGTH);
  }
  return abstract.slice(0, ABSTRACT_MAX_LENGTH);
}

/**
 * セクション木から目次を作る（ルートは含めない、前順）
 */
export function buildToc(root: Section): TocEntry[] {
  const entries: TocEntry[] = [];

  const walk = (section: Section): void => {
    for (const subsection of section.subsections) {
      entries.push({
        level: subsection.level,
        title: subsection.title,
        path: [...subsection.path],
      });
      walk(subsection);
    }
  };

  walk(root);
  return entries;
}
