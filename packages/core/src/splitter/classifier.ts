import type { ContentType } from '@content-splitter/types';

/**
 * 開始タグ・終了タグ・自己終了タグ
 * タグ名は英字で始まるもののみ（`a < b` やコメント、DOCTYPEは要素とみなさない）
 */
const HTML_ELEMENT_PATTERN = /<\/?[A-Za-z][A-Za-z0-9:-]*(?:\s[^<>]*)?\/?>/;

/**
 * HTML要素を1つ以上含むか
 */
export function containsHtmlElement(source: string): boolean {
  return HTML_ELEMENT_PATTERN.test(source);
}

/**
 * 入力がHTMLかプレーンテキストかを判定
 */
export function detectContentType(source: string): ContentType {
  return containsHtmlElement(source) ? 'html' : 'text';
}
