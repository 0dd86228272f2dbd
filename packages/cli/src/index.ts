#!/usr/bin/env tsx
/**
 * doc-chunks CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { CONFIG_ENV_VAR } from '@doc-chunks/types';
import { executeChunk, type ChunkCommandOptions } from './commands/chunk.js';
import { executeIngest, type IngestCommandOptions } from './commands/ingest.js';
import { executeConfigInit } from './commands/config/init.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('doc-chunks')
  .description('doc-chunks コマンドラインツール')
  .version(version)
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス')
      .env(CONFIG_ENV_VAR)
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

/**
 * チャンク閾値の上書きオプションを追加
 */
function addChunkingOptions(command: Command): Command {
  return command
    .option('--min <n>', '結合候補とする段落のトークン数（未満）')
    .option('--target <n>', '分割ウィンドウの目標トークン数')
    .option('--max <n>', 'チャンクの上限トークン数')
    .option('--overlap <n>', '分割ウィンドウ間で重複させる文の数')
    .addOption(
      new Option('--tokenizer <kind>', 'トークナイザ').choices(['whitespace', 'gpt'])
    );
}

// chunk コマンド
addChunkingOptions(
  program
    .command('chunk')
    .description('ファイルをチャンク化して表示')
    .argument('<file>', '対象ファイル')
    .option('--id <documentId>', '文書ID（デフォルト: プロジェクトルートからの相対パス）')
    .addOption(
      new Option('--format <format>', '出力形式').choices(['text', 'json']).default('text')
    )
).action(async (file: string, options: ChunkCommandOptions) => {
  await executeChunk(file, { ...options, config: globalConfigPath });
});

// ingest コマンド
addChunkingOptions(
  program
    .command('ingest')
    .description('ファイルをチャンク化してストレージに保存')
    .argument('[patterns...]', '対象ファイルのglobパターン（デフォルト: 設定のfiles.include）')
).action(async (patterns: string[], options: IngestCommandOptions) => {
  await executeIngest(patterns, { ...options, config: globalConfigPath });
});

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('-f, --force', '既存ファイルを上書き')
  .action(async (options: { force?: boolean }) => {
    await executeConfigInit(options);
  });

// コマンドラインを解析
await program.parseAsync(process.argv);
