import type {
  ChunkingConfig,
  FilesConfig,
  ProjectConfig,
  StorageConfig,
  TokenizerKind,
} from '../config.js';

/**
 * バリデーション済みの設定（未指定の項目はデフォルトで補う）
 */
export interface PartialDocChunksConfig {
  version?: string;
  project?: Partial<ProjectConfig>;
  files?: Partial<FilesConfig>;
  chunking?: Partial<ChunkingConfig>;
  storage?: Partial<StorageConfig>;
}

const TOKENIZER_KINDS: readonly TokenizerKind[] = ['whitespace', 'gpt'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTokenizerKind(value: unknown): value is TokenizerKind {
  return TOKENIZER_KINDS.some((kind) => kind === value);
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): PartialDocChunksConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: PartialDocChunksConfig = {};

  // バージョンのチェック
  if (config.version !== undefined) {
    if (typeof config.version !== 'string') {
      throw new Error('config.version must be a string');
    }
    result.version = config.version;
  }

  if (config.project !== undefined) {
    result.project = validateProjectConfig(config.project);
  }

  if (config.files !== undefined) {
    result.files = validateFilesConfig(config.files);
  }

  if (config.chunking !== undefined) {
    result.chunking = validateChunkingConfig(config.chunking);
  }

  if (config.storage !== undefined) {
    result.storage = validateStorageConfig(config.storage);
  }

  return result;
}

function validateProjectConfig(project: unknown): Partial<ProjectConfig> {
  if (!isRecord(project)) {
    throw new Error('config.project must be an object');
  }

  const result: Partial<ProjectConfig> = {};

  if (project.name !== undefined) {
    if (typeof project.name !== 'string') {
      throw new Error('config.project.name must be a string');
    }
    result.name = project.name;
  }

  if (project.root !== undefined) {
    if (typeof project.root !== 'string') {
      throw new Error('config.project.root must be a string');
    }
    result.root = project.root;
  }

  return result;
}

function validateStringArray(value: unknown, name: string): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${name} must be an array`);
  }

  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new Error(`${name} must be an array of strings`);
    }
    strings.push(item);
  }
  return strings;
}

function validateFilesConfig(files: unknown): Partial<FilesConfig> {
  if (!isRecord(files)) {
    throw new Error('config.files must be an object');
  }

  const result: Partial<FilesConfig> = {};

  if (files.include !== undefined) {
    result.include = validateStringArray(files.include, 'config.files.include');
  }

  if (files.exclude !== undefined) {
    result.exclude = validateStringArray(files.exclude, 'config.files.exclude');
  }

  return result;
}

function validateCount(value: unknown, name: string, allowZero: boolean): number {
  if (typeof value !== 'number') {
    throw new Error(`${name} must be a number`);
  }

  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer`);
  }

  if (allowZero ? value < 0 : value <= 0) {
    throw new Error(`${name} must be ${allowZero ? 'non-negative' : 'positive'}`);
  }

  return value;
}

function validateChunkingConfig(chunking: unknown): Partial<ChunkingConfig> {
  if (!isRecord(chunking)) {
    throw new Error('config.chunking must be an object');
  }

  const result: Partial<ChunkingConfig> = {};

  if (chunking.minTokens !== undefined) {
    result.minTokens = validateCount(chunking.minTokens, 'config.chunking.minTokens', false);
  }

  if (chunking.targetTokens !== undefined) {
    result.targetTokens = validateCount(
      chunking.targetTokens,
      'config.chunking.targetTokens',
      false
    );
  }

  if (chunking.maxTokens !== undefined) {
    result.maxTokens = validateCount(chunking.maxTokens, 'config.chunking.maxTokens', false);
  }

  if (chunking.sentenceOverlap !== undefined) {
    result.sentenceOverlap = validateCount(
      chunking.sentenceOverlap,
      'config.chunking.sentenceOverlap',
      true
    );
  }

  if (chunking.tokenizer !== undefined) {
    if (!isTokenizerKind(chunking.tokenizer)) {
      throw new Error('config.chunking.tokenizer must be "whitespace" or "gpt"');
    }
    result.tokenizer = chunking.tokenizer;
  }

  // 閾値の大小関係（両方指定された場合のみ。デフォルトとの組み合わせはエンジン側で検証）
  const { minTokens, targetTokens, maxTokens } = result;
  if (minTokens !== undefined && targetTokens !== undefined && minTokens >= targetTokens) {
    throw new Error('config.chunking.minTokens must be less than config.chunking.targetTokens');
  }
  if (targetTokens !== undefined && maxTokens !== undefined && targetTokens > maxTokens) {
    throw new Error(
      'config.chunking.targetTokens must be less than or equal to config.chunking.maxTokens'
    );
  }

  return result;
}

function validateStorageConfig(storage: unknown): Partial<StorageConfig> {
  if (!isRecord(storage)) {
    throw new Error('config.storage must be an object');
  }

  const result: Partial<StorageConfig> = {};

  if (storage.chunksPath !== undefined) {
    if (typeof storage.chunksPath !== 'string') {
      throw new Error('config.storage.chunksPath must be a string');
    }
    result.chunksPath = storage.chunksPath;
  }

  return result;
}
