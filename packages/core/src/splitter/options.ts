/**
 * 分割オプション
 */

import type { ContentType } from '@content-splitter/types';

/**
 * 警告の出力先（デフォルト: console）
 */
export interface SplitterLogger {
  warn(message: string): void;
}

export interface HtmlSplitOptions {
  /** 単独で最大バイト数を超えるタグ・テキストの警告出力先 */
  logger?: SplitterLogger;
}

export interface TextSplitOptions {
  /** 単独で最大バイト数を超える単語の警告出力先 */
  logger?: SplitterLogger;
  /**
   * 最大バイト数を超える単語をバイト境界で強制的に切断する（デフォルト: false）
   * falseの場合、その単語は単独のフラグメントとして上限を超えたまま出力される
   */
  breakLongWords?: boolean;
}

export type SplitOptions = HtmlSplitOptions &
  TextSplitOptions & {
    /** 判定済みのコンテンツ種別（指定時は判定を省略） */
    contentType?: ContentType;
  };
