import { readFile, access } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { ContentSplitterConfig, ContentSplitterConfigInput } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig } from './validator.js';

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
  /** 環境変数（デフォルト: process.env、テスト用） */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedConfig {
  config: ContentSplitterConfig;
  /** 読み込んだ設定ファイル（見つからなければnull） */
  configPath: string | null;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .content-splitter.json > content-splitter.json
 */
export const CONFIG_FILE_NAMES = ['.content-splitter.json', 'content-splitter.json'] as const;

/** 設定ファイルパスを指定する環境変数 */
export const CONFIG_ENV_VAR = 'CONTENT_SPLITTER_CONFIG';

function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス（デフォルト: ./.content-splitter.json）
   * @returns 設定オブジェクト
   */
  static async load(configPath: string = './.content-splitter.json'): Promise<ContentSplitterConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      // ファイル読み込み
      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      // バリデーション
      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.mergeWithDefaults(config);
    } catch (error) {
      if (isNotFoundError(error)) {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 明示指定 > 環境変数 > 自動探索
   * - 見つからなければデフォルト設定
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const {
      configPath: explicitPath,
      traverseUp = true,
      cwd = process.cwd(),
      requireConfig = false,
      env = process.env,
    } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp, env);

    // 設定ファイルが必須なのに見つからない場合はエラー
    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
        'Run: content-splitter config init'
      );
    }

    const config = configPath
      ? await this.load(configPath)
      : this.getDefaultConfig();

    return { config, configPath };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): ContentSplitterConfig {
    return {
      version: DEFAULT_CONFIG.version,
      split: { ...DEFAULT_CONFIG.split },
      output: { ...DEFAULT_CONFIG.output },
    };
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
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean,
    env: NodeJS.ProcessEnv
  ): Promise<string | null> {
    // 1. 明示的に指定されている
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    // 2. 環境変数
    const envPath = env[CONFIG_ENV_VAR];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    // 3. 自動探索
    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: ContentSplitterConfigInput): ContentSplitterConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      split: {
        maxLength: config.split?.maxLength ?? DEFAULT_CONFIG.split.maxLength,
        breakLongWords: config.split?.breakLongWords ?? DEFAULT_CONFIG.split.breakLongWords,
      },
      output: {
        directory: config.output?.directory ?? DEFAULT_CONFIG.output.directory,
        htmlExtension: config.output?.htmlExtension ?? DEFAULT_CONFIG.output.htmlExtension,
        textExtension: config.output?.textExtension ?? DEFAULT_CONFIG.output.textExtension,
      },
    };
  }
}
