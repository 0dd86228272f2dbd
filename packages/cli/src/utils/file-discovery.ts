import fg from 'fast-glob';
import * as path from 'path';
import type { FilesConfig } from '@doc-chunks/types';

export interface FileDiscoveryOptions {
  /** プロジェクトルート */
  rootDir: string;
  /** ファイル検索設定 */
  config: FilesConfig;
}

/**
 * ファイル検索クラス
 * Globパターンで取り込み対象の文書ファイルを検索
 */
export class FileDiscovery {
  private rootDir: string;
  private config: FilesConfig;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
  }

  /**
   * ファイルを検索
   * @param patterns 検索パターン（省略時は設定のinclude）
   * @returns 見つかったファイルのパス一覧（プロジェクトルートからの相対パス、ソート済み）
   */
  async findFiles(patterns?: string[]): Promise<string[]> {
    const include = patterns && patterns.length > 0 ? patterns : this.config.include;

    const files = await fg(include, {
      cwd: this.rootDir,
      ignore: this.config.exclude,
      absolute: false, // 相対パスを返す
      onlyFiles: true,
      dot: false, // ドットファイルを除外
    });

    // fast-globの列挙順はファイルシステム依存のため並べ替える
    return files.sort();
  }
}
