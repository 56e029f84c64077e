/**
 * 出力フォーマットユーティリティ
 */

import type { ContentType, FragmentReport } from '@content-splitter/types';

/** フラグメント行の区切り線 */
export const FRAGMENT_SEPARATOR = '-'.repeat(20);

/**
 * 分割結果全体
 */
export interface SplitReport {
  contentType: ContentType;
  maxLength: number;
  /** 出力先ディレクトリ（dry-run時はnull） */
  outputDirectory: string | null;
  fragments: FragmentReport[];
}

/**
 * 出力ファイル名（例: fragment_html_1.html）
 */
export function fragmentFileName(
  contentType: ContentType,
  index: number,
  extension: string
): string {
  return `fragment_${contentType}_${index}${extension}`;
}

/**
 * フラグメント1件をテキスト形式で出力
 */
export function formatFragmentAsText(report: FragmentReport): string {
  return `fragment #${report.index}: ${report.bytes} bytes.\n${FRAGMENT_SEPARATOR}`;
}

/**
 * 分割結果のまとめをテキスト形式で出力
 */
export function formatSummaryAsText(report: SplitReport): string {
  const count = report.fragments.length;
  if (count === 0) {
    return 'フラグメントなし（入力が空です）';
  }
  const destination = report.outputDirectory ?? '(dry-run)';
  return `${count}件のフラグメント（${report.contentType}, 上限${report.maxLength}バイト） → ${destination}`;
}

/**
 * 分割結果をJSON形式で出力
 */
export function formatSplitReportAsJson(report: SplitReport): string {
  return JSON.stringify(report, null, 2);
}
