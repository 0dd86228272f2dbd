import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { ConfigLoader, CONFIG_ENV_VAR } from '../loader.js';
import { validateConfig } from '../validator.js';
import { DEFAULT_CONFIG, toChunkingPolicy } from '../../config.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';

const TEST_DIR = path.join(tmpdir(), `doc-chunks-config-test-${process.pid}`);

describe('ConfigLoader', () => {
  beforeAll(async () => {
    // テスト用ディレクトリ作成
    await fs.mkdir(TEST_DIR, { recursive: true });
  });

  afterAll(async () => {
    // テスト用ディレクトリ削除
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('デフォルト設定を取得できる', () => {
      const config = ConfigLoader.getDefaultConfig();
      expect(config.version).toBe('1.0');
      expect(config.files.include).toEqual(['**/*.md']);
      expect(config.chunking).toEqual({
        minTokens: 80,
        targetTokens: 220,
        maxTokens: 300,
        sentenceOverlap: 1,
        tokenizer: 'whitespace',
      });
      expect(config.storage.chunksPath).toBe('.doc-chunks/chunks');
    });

    it('返された設定を変更してもデフォルトに影響しない', () => {
      const config = ConfigLoader.getDefaultConfig();
      config.files.include.push('**/*.txt');
      config.chunking.minTokens = 1;

      expect(DEFAULT_CONFIG.files.include).toEqual(['**/*.md']);
      expect(ConfigLoader.getDefaultConfig().chunking.minTokens).toBe(80);
    });
  });

  describe('load', () => {
    it('存在しないファイルはデフォルト設定を返す', async () => {
      const config = await ConfigLoader.load(path.join(TEST_DIR, 'nonexistent.json'));
      expect(config).toEqual(ConfigLoader.getDefaultConfig());
    });

    it('部分的な設定をデフォルト値とマージする', async () => {
      const configPath = path.join(TEST_DIR, 'partial.json');
      await fs.writeFile(
        configPath,
        JSON.stringify({ chunking: { maxTokens: 400, tokenizer: 'gpt' } }, null, 2)
      );

      const config = await ConfigLoader.load(configPath);
      expect(config.chunking.maxTokens).toBe(400);
      expect(config.chunking.tokenizer).toBe('gpt');
      // 他はデフォルト値
      expect(config.chunking.minTokens).toBe(80);
      expect(config.chunking.targetTokens).toBe(220);
      expect(config.files.include).toEqual(['**/*.md']);
    });

    it('不正なJSON形式でエラー', async () => {
      const configPath = path.join(TEST_DIR, 'invalid-json.json');
      await fs.writeFile(configPath, '{ invalid json }');

      await expect(ConfigLoader.load(configPath)).rejects.toThrow();
    });

    it('バリデーションエラーはそのまま投げる', async () => {
      const configPath = path.join(TEST_DIR, 'invalid-value.json');
      await fs.writeFile(configPath, JSON.stringify({ chunking: { minTokens: -5 } }));

      await expect(ConfigLoader.load(configPath)).rejects.toThrow(
        'config.chunking.minTokens must be positive'
      );
    });
  });

  describe('resolve', () => {
    let projectDir: string;
    let savedEnv: string | undefined;

    beforeEach(async () => {
      savedEnv = process.env[CONFIG_ENV_VAR];
      delete process.env[CONFIG_ENV_VAR];
      projectDir = await fs.mkdtemp(path.join(TEST_DIR, 'project-'));
    });

    afterEach(() => {
      if (savedEnv === undefined) {
        delete process.env[CONFIG_ENV_VAR];
      } else {
        process.env[CONFIG_ENV_VAR] = savedEnv;
      }
    });

    it('親ディレクトリを遡って設定ファイルを見つける', async () => {
      const nested = path.join(projectDir, 'docs', 'guide');
      await fs.mkdir(nested, { recursive: true });
      await fs.writeFile(
        path.join(projectDir, '.doc-chunks.json'),
        JSON.stringify({ project: { name: 'nested' } })
      );

      const result = await ConfigLoader.resolve({ cwd: nested });

      expect(result.configPath).toBe(path.join(projectDir, '.doc-chunks.json'));
      expect(result.config.project.name).toBe('nested');
      expect(result.projectRoot).toBe(await fs.realpath(projectDir));
    });

    it('traverseUp=falseなら親を探索しない', async () => {
      const nested = path.join(projectDir, 'sub');
      await fs.mkdir(nested, { recursive: true });
      await fs.writeFile(path.join(projectDir, 'doc-chunks.json'), '{}');

      const result = await ConfigLoader.resolve({ cwd: nested, traverseUp: false });

      expect(result.configPath).toBeNull();
      expect(result.projectRoot).toBe(await fs.realpath(nested));
    });

    it('project.rootを設定ファイルの位置から解決する', async () => {
      await fs.mkdir(path.join(projectDir, 'content'), { recursive: true });
      const configPath = path.join(projectDir, 'custom.json');
      await fs.writeFile(configPath, JSON.stringify({ project: { root: './content' } }));

      const result = await ConfigLoader.resolve({ configPath, cwd: projectDir });

      expect(result.configPath).toBe(configPath);
      expect(result.projectRoot).toBe(await fs.realpath(path.join(projectDir, 'content')));
    });

    it('環境変数で設定ファイルを指定できる', async () => {
      const configPath = path.join(projectDir, 'from-env.json');
      await fs.writeFile(configPath, JSON.stringify({ chunking: { sentenceOverlap: 0 } }));
      process.env[CONFIG_ENV_VAR] = configPath;

      const result = await ConfigLoader.resolve({ cwd: projectDir, traverseUp: false });

      expect(result.configPath).toBe(configPath);
      expect(result.config.chunking.sentenceOverlap).toBe(0);
    });

    it('requireConfig=trueで見つからなければエラー', async () => {
      await expect(
        ConfigLoader.resolve({ cwd: projectDir, traverseUp: false, requireConfig: true })
      ).rejects.toThrow('Configuration file not found');
    });
  });
});

describe('validateConfig', () => {
  it('有効な設定を検証できる', () => {
    const config = {
      version: '1.0',
      project: { name: 'test', root: '.' },
      files: { include: ['**/*.md'], exclude: ['**/node_modules/**'] },
      chunking: {
        minTokens: 50,
        targetTokens: 150,
        maxTokens: 150,
        sentenceOverlap: 2,
        tokenizer: 'gpt',
      },
      storage: { chunksPath: 'out/chunks' },
    };

    expect(validateConfig(config)).toEqual(config);
  });

  it('未知のキーは取り除かれる', () => {
    expect(validateConfig({ server: { port: 1 }, version: '2.0' })).toEqual({ version: '2.0' });
  });

  it('オブジェクト以外でエラー', () => {
    expect(() => validateConfig(null)).toThrow('Config must be an object');
    expect(() => validateConfig('string')).toThrow('Config must be an object');
    expect(() => validateConfig(123)).toThrow('Config must be an object');
  });

  describe('files設定', () => {
    it('includeが配列でない場合エラー', () => {
      expect(() => validateConfig({ files: { include: 'not-array' } })).toThrow(
        'config.files.include must be an array'
      );
    });

    it('includeが文字列配列でない場合エラー', () => {
      expect(() => validateConfig({ files: { include: [1, 2, 3] } })).toThrow(
        'config.files.include must be an array of strings'
      );
    });

    it('excludeが配列でない場合エラー', () => {
      expect(() => validateConfig({ files: { exclude: 'not-array' } })).toThrow(
        'config.files.exclude must be an array'
      );
    });
  });

  describe('chunking設定', () => {
    it('minTokensが数値でない場合エラー', () => {
      expect(() => validateConfig({ chunking: { minTokens: '80' } })).toThrow(
        'config.chunking.minTokens must be a number'
      );
    });

    it('maxTokensが0以下の場合エラー', () => {
      expect(() => validateConfig({ chunking: { maxTokens: 0 } })).toThrow(
        'config.chunking.maxTokens must be positive'
      );
    });

    it('整数でない場合エラー', () => {
      expect(() => validateConfig({ chunking: { targetTokens: 12.5 } })).toThrow(
        'config.chunking.targetTokens must be an integer'
      );
    });

    it('sentenceOverlapは0を許可し、負数はエラー', () => {
      expect(validateConfig({ chunking: { sentenceOverlap: 0 } })).toEqual({
        chunking: { sentenceOverlap: 0 },
      });
      expect(() => validateConfig({ chunking: { sentenceOverlap: -1 } })).toThrow(
        'config.chunking.sentenceOverlap must be non-negative'
      );
    });

    it('minTokens >= targetTokensの場合エラー', () => {
      expect(() => validateConfig({ chunking: { minTokens: 220, targetTokens: 220 } })).toThrow(
        'config.chunking.minTokens must be less than config.chunking.targetTokens'
      );
    });

    it('targetTokens > maxTokensの場合エラー', () => {
      expect(() => validateConfig({ chunking: { targetTokens: 301, maxTokens: 300 } })).toThrow(
        'config.chunking.targetTokens must be less than or equal to config.chunking.maxTokens'
      );
    });

    it('未知のtokenizerでエラー', () => {
      expect(() => validateConfig({ chunking: { tokenizer: 'sentencepiece' } })).toThrow(
        'config.chunking.tokenizer must be "whitespace" or "gpt"'
      );
    });
  });

  describe('storage設定', () => {
    it('chunksPathが文字列でない場合エラー', () => {
      expect(() => validateConfig({ storage: { chunksPath: 42 } })).toThrow(
        'config.storage.chunksPath must be a string'
      );
    });
  });
});

describe('toChunkingPolicy', () => {
  it('tokenizerを除いた閾値のみを取り出す', () => {
    expect(toChunkingPolicy(DEFAULT_CONFIG.chunking)).toEqual({
      minTokens: 80,
      targetTokens: 220,
      maxTokens: 300,
      sentenceOverlap: 1,
    });
  });
});
