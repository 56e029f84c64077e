#!/usr/bin/env node
/**
 * content-splitter CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { CONFIG_ENV_VAR } from '@content-splitter/types';
import { executeSplit, type SplitCommandOptions } from './commands/split.js';
import { executeConfigInit } from './commands/config/init.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('content-splitter')
  .description('HTML/テキストをバイト数上限つきのフラグメントに分割するツール')
  .version(packageJson.version)
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス')
      .env(CONFIG_ENV_VAR)
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// split コマンド
program
  .command('split')
  .description('ファイル（省略時は標準入力）をフラグメントに分割')
  .argument('[file]', '入力ファイル（"-" で標準入力）')
  .option('--max-len <n>', 'フラグメントの最大バイト数（デフォルト: 設定ファイル、4096）')
  .option('--out <dir>', '出力先ディレクトリ（デフォルト: 設定ファイル、fragments）')
  .option('--format <format>', '出力形式 (text, json)', 'text')
  .option('--dry-run', 'ファイルを書き出さずに結果のみ表示')
  .action((file: string | undefined, options: SplitCommandOptions) => {
    void executeSplit(file, { ...options, config: globalConfigPath });
  });

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('--max-len <n>', 'フラグメントの最大バイト数')
  .option('--out <dir>', '出力先ディレクトリ')
  .option('-f, --force', '既存ファイルを上書き')
  .action((options: { maxLen?: string; out?: string; force?: boolean }) => {
    void executeConfigInit(options);
  });

// コマンドラインを解析
program.parse(process.argv);
