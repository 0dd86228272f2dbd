import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { CHUNK_ID_PATTERN } from '@doc-chunks/types';
import { deriveChunkId } from '../chunk-identity.js';

describe('deriveChunkId', () => {
  it('16桁の16進文字列を返す', () => {
    expect(deriveChunkId('doc-1', ['Intro'], 0)).toMatch(/^[0-9a-f]{16}$/);
  });

  it('ストレージが検証するID形式と一致する', () => {
    expect(CHUNK_ID_PATTERN.test(deriveChunkId('doc-1', ['Intro'], 0))).toBe(true);
    expect(CHUNK_ID_PATTERN.test(deriveChunkId('doc-1', ['Intro'], 0, 4))).toBe(true);
  });

  it('正規化した文字列のMD5先頭16桁', () => {
    const expected = createHash('md5')
      .update('doc-1\u001eIntro\u001fHistory\u001e2\u001e3')
      .digest('hex')
      .slice(0, 16);

    expect(deriveChunkId('doc-1', ['Intro', 'History'], 2, 3)).toBe(expected);
  });

  it('同じ入力からは同じIDになる', () => {
    expect(deriveChunkId('doc-1', ['A', 'B'], 4)).toBe(deriveChunkId('doc-1', ['A', 'B'], 4));
  });

  it('subchunkIndexの未指定と0は区別される', () => {
    expect(deriveChunkId('doc-1', ['A'], 0)).not.toBe(deriveChunkId('doc-1', ['A'], 0, 0));
  });

  it('いずれかの入力が異なればIDも異なる', () => {
    const base = deriveChunkId('doc-1', ['A'], 1, 0);

    expect(deriveChunkId('doc-2', ['A'], 1, 0)).not.toBe(base);
    expect(deriveChunkId('doc-1', ['B'], 1, 0)).not.toBe(base);
    expect(deriveChunkId('doc-1', ['A'], 2, 0)).not.toBe(base);
    expect(deriveChunkId('doc-1', ['A'], 1, 1)).not.toBe(base);
    expect(deriveChunkId('doc-1', [], 1, 0)).not.toBe(base);
  });

  it('見出しに/を含んでもpathの区切りと衝突しない', () => {
    expect(deriveChunkId('doc-1', ['Input/Output'], 0)).not.toBe(
      deriveChunkId('doc-1', ['Input', 'Output'], 0)
    );
  });
});
