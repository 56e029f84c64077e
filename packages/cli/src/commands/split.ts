/**
 * split コマンド
 * 入力をフラグメントに分割してファイルに書き出す
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigLoader, type FragmentReport } from '@content-splitter/types';
import {
  ContentSplitterError,
  byteLength,
  classifyContent,
  splitContent,
} from '@content-splitter/core';
import { readSource } from '../utils/input.js';
import { formatValidationError, maxLenSchema, outSchema } from '../utils/options.js';
import {
  formatFragmentAsText,
  formatSplitReportAsJson,
  formatSummaryAsText,
  fragmentFileName,
  type SplitReport,
} from '../utils/output.js';

export interface SplitCommandOptions {
  /** 最大バイト数（文字列のまま受け取り、検証時に数値化） */
  maxLen?: string;
  /** 出力先ディレクトリ */
  out?: string;
  format?: string;
  dryRun?: boolean;
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
  /** 標準入力（テスト用、デフォルト: process.stdin） */
  stdin?: NodeJS.ReadableStream;
}

const splitOptionsSchema = z.object({
  maxLen: maxLenSchema.optional(),
  out: outSchema.optional(),
  format: z.enum(['text', 'json']).default('text'),
  dryRun: z.boolean().default(false),
});

/**
 * 入力を分割し、フラグメントを書き出す
 * テキスト形式では1件書き出すごとに結果を出力する
 */
export async function runSplit(
  file: string | undefined,
  options: SplitCommandOptions = {}
): Promise<SplitReport> {
  const parsed = splitOptionsSchema.safeParse({
    maxLen: options.maxLen,
    out: options.out,
    format: options.format,
    dryRun: options.dryRun,
  });
  if (!parsed.success) {
    throw new Error(formatValidationError(parsed.error));
  }
  const { maxLen, out, format, dryRun } = parsed.data;

  const cwd = options.cwd || process.cwd();
  const { config } = await ConfigLoader.resolve({ configPath: options.config, cwd });

  const source = await readSource(file, { cwd, stdin: options.stdin });
  const maxLength = maxLen ?? config.split.maxLength;
  const contentType = classifyContent(source);
  const fragments = splitContent(source, maxLength, {
    breakLongWords: config.split.breakLongWords,
    contentType,
  });
  const extension =
    contentType === 'html' ? config.output.htmlExtension : config.output.textExtension;

  const outputDirectory = dryRun
    ? null
    : path.resolve(cwd, out ?? config.output.directory);
  if (outputDirectory) {
    await fs.mkdir(outputDirectory, { recursive: true });
  }

  const reports: FragmentReport[] = [];
  let index = 0;
  for (const fragment of fragments) {
    index++;
    let filePath: string | null = null;
    if (outputDirectory) {
      filePath = path.join(outputDirectory, fragmentFileName(contentType, index, extension));
      await fs.writeFile(filePath, fragment, 'utf-8');
    }

    const report: FragmentReport = {
      index,
      bytes: byteLength(fragment),
      contentType,
      file: filePath,
    };
    reports.push(report);

    if (format === 'text') {
      console.log(formatFragmentAsText(report));
    }
  }

  const splitReport: SplitReport = {
    contentType,
    maxLength,
    outputDirectory,
    fragments: reports,
  };

  console.log(
    format === 'json' ? formatSplitReportAsJson(splitReport) : formatSummaryAsText(splitReport)
  );
  return splitReport;
}

/**
 * split コマンドを実行
 */
export async function executeSplit(
  file: string | undefined,
  options: SplitCommandOptions
): Promise<void> {
  try {
    await runSplit(file, options);
  } catch (error) {
    if (error instanceof ContentSplitterError) {
      console.error(`エラー [${error.code}]: ${error.message}`);
    } else if (error instanceof Error) {
      console.error(`エラー: ${error.message}`);
    } else {
      console.error('エラー: 不明なエラーが発生しました。');
    }
    process.exit(1);
  }
}
