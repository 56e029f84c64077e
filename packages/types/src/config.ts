/**
 * 設定ファイルの型定義
 */

export interface ContentSplitterConfig {
  version: string;
  split: SplitConfig;
  output: OutputConfig;
}

export interface SplitConfig {
  /** フラグメントあたりの最大バイト数（UTF-8） */
  maxLength: number;
  /** 最大バイト数を超える単語を強制的に切断するか */
  breakLongWords: boolean;
}

export interface OutputConfig {
  /** フラグメントの出力先ディレクトリ */
  directory: string;
  /** HTMLフラグメントの拡張子 */
  htmlExtension: string;
  /** テキストフラグメントの拡張子 */
  textExtension: string;
}

/**
 * 設定ファイルから読み込んだ部分的な設定（検証済み）
 */
export interface ContentSplitterConfigInput {
  version?: string;
  split?: Partial<SplitConfig>;
  output?: Partial<OutputConfig>;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: ContentSplitterConfig = {
  version: '1.0',
  split: {
    maxLength: 4096,
    breakLongWords: false,
  },
  output: {
    directory: 'fragments',
    htmlExtension: '.html',
    textExtension: '.txt',
  },
};
