import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { DocChunksConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { getErrnoCode } from '../errors.js';
import { validateConfig, type PartialDocChunksConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .doc-chunks.json > doc-chunks.json
 */
export const CONFIG_FILE_NAMES = ['.doc-chunks.json', 'doc-chunks.json'] as const;

/** 設定ファイルパスを指定する環境変数 */
export const CONFIG_ENV_VAR = 'DOC_CHUNKS_CONFIG';

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス（デフォルト: ./.doc-chunks.json）
   * @returns 設定オブジェクト
   */
  static async load(configPath: string = './.doc-chunks.json'): Promise<DocChunksConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      return this.mergeWithDefaults(config);
    } catch (error) {
      if (getErrnoCode(error) === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(
    options: ResolveConfigOptions = {}
  ): Promise<{
    config: DocChunksConfig;
    configPath: string | null;
    projectRoot: string;
  }> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd(), requireConfig = false } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
        'Run: doc-chunks config init'
      );
    }

    if (!configPath) {
      return {
        config: this.getDefaultConfig(),
        configPath: null,
        projectRoot: await this.normalizeProjectRoot(cwd),
      };
    }

    // 2. 設定を読み込み、project.rootからプロジェクトルートを決定
    const config = await this.load(configPath);
    const configDir = path.dirname(path.resolve(configPath));
    const projectRoot = await this.normalizeProjectRoot(
      path.resolve(configDir, config.project.root)
    );

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得（呼び出し側で変更されても影響しないようコピーを返す）
   */
  static getDefaultConfig(): DocChunksConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string,
    traverseUp: boolean
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 優先順位: 明示的な指定 > 環境変数 > 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env[CONFIG_ENV_VAR];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (_error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      return absolutePath.replace(/\/$/, '');
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: PartialDocChunksConfig): DocChunksConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      project: {
        name: config.project?.name ?? DEFAULT_CONFIG.project.name,
        root: config.project?.root ?? DEFAULT_CONFIG.project.root,
      },
      files: {
        include: config.files?.include ?? [...DEFAULT_CONFIG.files.include],
        exclude: config.files?.exclude ?? [...DEFAULT_CONFIG.files.exclude],
      },
      chunking: {
        minTokens: config.chunking?.minTokens ?? DEFAULT_CONFIG.chunking.minTokens,
        targetTokens: config.chunking?.targetTokens ?? DEFAULT_CONFIG.chunking.targetTokens,
        maxTokens: config.chunking?.maxTokens ?? DEFAULT_CONFIG.chunking.maxTokens,
        sentenceOverlap:
          config.chunking?.sentenceOverlap ?? DEFAULT_CONFIG.chunking.sentenceOverlap,
        tokenizer: config.chunking?.tokenizer ?? DEFAULT_CONFIG.chunking.tokenizer,
      },
      storage: {
        chunksPath: config.storage?.chunksPath ?? DEFAULT_CONFIG.storage.chunksPath,
      },
    };
  }
}
