/**
 * フラグメント関連の型定義
 */

/** 入力の種別（HTMLかプレーンテキストか） */
export type ContentType = 'html' | 'text';

/**
 * 現在開いているタグ階層から組み立てたマークアップ
 */
export interface TagHierarchy {
  /** 開きタグ（外側から順、属性付きの元テキスト） */
  opening: string;
  /** 閉じタグ（内側から順） */
  closing: string;
}

/**
 * 新しいフラグメントの先頭で開き直すために保存する開きタグ
 */
export interface SavedTag {
  /** 属性を含む開きタグの元テキスト（例: `<div class="a">`） */
  rawTag: string;
  /** タグ名（例: `div`） */
  name: string;
}

/**
 * 分割結果1件分のレポート（CLI出力用）
 */
export interface FragmentReport {
  /** 1始まりの番号 */
  index: number;
  /** UTF-8バイト数 */
  bytes: number;
  contentType: ContentType;
  /** 書き出したファイルのパス（dry-run時はnull） */
  file: string | null;
}
