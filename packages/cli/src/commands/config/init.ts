/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigLoader, type ContentSplitterConfig } from '@content-splitter/types';
import { formatValidationError, maxLenSchema, outSchema } from '../../utils/options.js';

export interface ConfigInitOptions {
  /** フラグメントの最大バイト数（指定しない場合はデフォルト値、CLIからは文字列） */
  maxLength?: number | string;
  /** 出力先ディレクトリ（指定しない場合はデフォルト値） */
  outputDirectory?: string;
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

const initOptionsSchema = z.object({
  maxLength: maxLenSchema.optional(),
  outputDirectory: outSchema.optional(),
});

type InitOverrides = z.infer<typeof initOptionsSchema>;

/**
 * デフォルト設定オブジェクトを生成
 */
function createDefaultConfig(overrides: InitOverrides): ContentSplitterConfig {
  const config = ConfigLoader.getDefaultConfig();
  if (overrides.maxLength !== undefined) {
    config.split.maxLength = overrides.maxLength;
  }
  if (overrides.outputDirectory !== undefined) {
    config.output.directory = overrides.outputDirectory;
  }
  return config;
}

/**
 * config init コマンドを実行
 * @returns 生成した設定ファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, '.content-splitter.json');

  const parsed = initOptionsSchema.safeParse({
    maxLength: options.maxLength,
    outputDirectory: options.outputDirectory,
  });
  if (!parsed.success) {
    throw new Error(formatValidationError(parsed.error));
  }

  console.log('Initializing content-splitter configuration...\n');

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
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }

  const config = createDefaultConfig(parsed.data);

  // ファイル書き込み
  const configContent = JSON.stringify(config, null, 2) + '\n';
  await fs.writeFile(configPath, configContent, 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`📏 Max length: ${config.split.maxLength} bytes`);
  console.log(`📁 Output: ${config.output.directory}\n`);
  console.log('Next steps:');
  console.log('  1. Review and customize .content-splitter.json');
  console.log('  2. Split a file: content-splitter split input.html\n');

  return configPath;
}

/**
 * CLIから呼ばれるラッパー
 */
export async function executeConfigInit(options: {
  maxLen?: string;
  out?: string;
  force?: boolean;
}): Promise<void> {
  try {
    await initConfig({
      maxLength: options.maxLen,
      outputDirectory: options.out,
      force: options.force,
    });
  } catch (error) {
    console.error(`エラー: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
