/**
 * ingest コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { createHash } from 'crypto';
import { FileChunkStorage } from '@doc-chunks/storage';
import { ingestFiles } from '../ingest.js';

describe('ingest', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = path.join(tmpdir(), `test-ingest-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(path.join(testDir, 'docs'), { recursive: true });
    await fs.mkdir(path.join(testDir, 'node_modules', 'pkg'), { recursive: true });
    await fs.writeFile(path.join(testDir, '.doc-chunks.json'), '{}');
    await fs.writeFile(path.join(testDir, 'docs', 'a.md'), '# Alpha\nIntro text here.');
    await fs.writeFile(
      path.join(testDir, 'docs', 'b.md'),
      'preface\n\n# Beta\nbody one\n\n## Sub\nbody two'
    );
    await fs.writeFile(path.join(testDir, 'node_modules', 'pkg', 'README.md'), '# Ignored');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('設定のincludeに合うファイルを取り込む', async () => {
    const report = await ingestFiles([], { cwd: testDir });

    expect(report.results).toEqual([
      { documentId: 'docs/a.md', chunks: 1, inserted: 1, skipped: 0 },
      { documentId: 'docs/b.md', chunks: 3, inserted: 3, skipped: 0 },
    ]);
    expect(report.failures).toEqual([]);
    expect(console.log).toHaveBeenCalledWith('docs/b.md: 3 chunks (inserted 3, skipped 0)');
  });

  it('変更のないファイルを再度取り込んでも何も挿入しない', async () => {
    await ingestFiles([], { cwd: testDir });

    const { results } = await ingestFiles([], { cwd: testDir });

    expect(results.map((result) => [result.inserted, result.skipped])).toEqual([
      [0, 1],
      [0, 3],
    ]);
  });

  it('文書レコードとチャンクを保存する', async () => {
    await ingestFiles([], { cwd: testDir });
    const storage = new FileChunkStorage({ basePath: path.join(testDir, '.doc-chunks', 'chunks') });

    const record = await storage.getDocument('docs/b.md');
    const chunks = await storage.listChunks('docs/b.md');

    expect(record).toMatchObject({
      documentId: 'docs/b.md',
      title: 'Beta',
      abstract: 'preface',
      toc: [
        { level: 1, title: 'Beta', path: ['Beta'] },
        { level: 2, title: 'Sub', path: ['Beta', 'Sub'] },
      ],
      sourcePath: 'docs/b.md',
    });
    expect(chunks.map((chunk) => [chunk.text, chunk.sectionPath])).toEqual([
      ['preface', []],
      ['body one', ['Beta']],
      ['body two', ['Beta', 'Sub']],
    ]);
    expect(await storage.listDocuments()).toEqual(['docs/a.md', 'docs/b.md']);
  });

  it('パターンを指定するとそのファイルだけ取り込む', async () => {
    const { results } = await ingestFiles(['docs/a.md'], { cwd: testDir });

    expect(results.map((result) => result.documentId)).toEqual(['docs/a.md']);
  });

  it('対象がなければ警告して空の結果', async () => {
    const report = await ingestFiles(['**/*.txt'], { cwd: testDir });

    expect(report).toEqual({ results: [], failures: [] });
    expect(console.warn).toHaveBeenCalledWith('No files matched.');
  });

  it('失敗したファイルは報告して残りのファイルを取り込む', async () => {
    // docs/a.mdの保存先ディレクトリの位置にファイルを置いて書き込みを失敗させる
    const chunksDir = path.join(testDir, '.doc-chunks', 'chunks');
    await fs.mkdir(chunksDir, { recursive: true });
    const documentKey = createHash('sha256').update('docs/a.md').digest('hex').slice(0, 16);
    await fs.writeFile(path.join(chunksDir, documentKey), 'not a directory');
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const report = await ingestFiles([], { cwd: testDir });

    expect(report.failures.map((failure) => failure.documentId)).toEqual(['docs/a.md']);
    expect(report.results).toEqual([
      { documentId: 'docs/b.md', chunks: 3, inserted: 3, skipped: 0 },
    ]);
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^docs\/a\.md: failed \(/));
  });

  it('不正な閾値の上書きはエラー', async () => {
    await expect(ingestFiles([], { cwd: testDir, min: '400' })).rejects.toThrow(
      'minTokens (400) must be less than targetTokens (220)'
    );
  });
});
