/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_CONFIG, getErrnoCode, type DocChunksConfig } from '@doc-chunks/types';

export interface ConfigInitOptions {
  /** プロジェクトルート（デフォルト: cwd） */
  projectRoot?: string;
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * デフォルト設定オブジェクトを生成
 */
function createDefaultConfig(options: { projectRoot: string }): DocChunksConfig {
  return {
    version: DEFAULT_CONFIG.version,
    project: {
      name: path.basename(options.projectRoot),
      root: '.',
    },
    files: {
      include: [...DEFAULT_CONFIG.files.include],
      exclude: [...DEFAULT_CONFIG.files.exclude],
    },
    chunking: { ...DEFAULT_CONFIG.chunking },
    storage: { ...DEFAULT_CONFIG.storage },
  };
}

/**
 * config init コマンドを実行
 * @returns 生成した設定ファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const projectRoot = options.projectRoot || cwd;
  const configPath = path.join(cwd, '.doc-chunks.json');

  console.log('Initializing doc-chunks configuration...\n');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
      );
    }

    console.log('⚠️  Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if (getErrnoCode(error) !== 'ENOENT') {
      throw error;
    }
  }

  const config = createDefaultConfig({ projectRoot });

  const configContent = JSON.stringify(config, null, 2) + '\n';
  await fs.writeFile(configPath, configContent, 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`🚀 Project: ${config.project.name}`);
  console.log(`📁 Root: ${projectRoot}\n`);
  console.log('Next steps:');
  console.log('  1. Review and customize .doc-chunks.json');
  console.log('  2. Preview chunks: doc-chunks chunk <file>');
  console.log('  3. Store chunks: doc-chunks ingest\n');

  return configPath;
}

/**
 * config init コマンドを実行（CLI用）
 */
export async function executeConfigInit(options: ConfigInitOptions): Promise<void> {
  try {
    await initConfig(options);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
