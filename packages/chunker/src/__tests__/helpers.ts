import type { Section } from '@doc-chunks/types';

/**
 * 空白区切りでn語のテキストを生成（語は英小文字+数字のみ）
 */
export function words(count: number, prefix: string): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(' ');
}

/**
 * n語からなる1文（末尾にピリオド）
 */
export function sentence(count: number, prefix: string): string {
  return `${words(count, prefix)}.`;
}

/**
 * 子を持たないセクション
 */
export function leafSection(content: string[], path: string[] = ['Intro']): Section {
  return {
    title: path.length > 0 ? path[path.length - 1] : '',
    level: path.length,
    path,
    content,
    subsections: [],
  };
}
