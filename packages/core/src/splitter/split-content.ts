import type { ContentType } from '@content-splitter/types';
import { InvalidInputFormatError, InvalidInputTypeError, describeValueType } from '../errors.js';
import { detectContentType } from './classifier.js';
import { splitHtmlContent } from './html-splitter.js';
import type { SplitOptions } from './options.js';
import { splitTextContent } from './text-splitter.js';

function* noFragments(): Generator<string, void, undefined> {
  // 空の列
}

/**
 * 入力を検証し、HTMLかプレーンテキストかを判定する
 *
 * @throws {InvalidInputTypeError} sourceが文字列でない
 * @throws {InvalidInputFormatError} 判定処理が想定外のエラーで失敗した
 */
export function classifyContent(source: unknown): ContentType {
  if (typeof source !== 'string') {
    throw new InvalidInputTypeError(describeValueType(source));
  }
  try {
    return detectContentType(source);
  } catch (error) {
    throw new InvalidInputFormatError(error);
  }
}

/**
 * HTMLかプレーンテキストかを判定し、対応する分割処理に振り分ける
 *
 * 入力の検証と判定は呼び出し時に行うため、エラーは最初のnext()より前に投げられる。
 * 空文字列やmaxLength <= 0の場合は空の列を返す。
 * options.contentTypeがあれば判定は行わない。
 *
 * @throws {InvalidInputTypeError} sourceが文字列でない
 * @throws {InvalidInputFormatError} 判定処理が想定外のエラーで失敗した
 */
export function splitContent(
  source: unknown,
  maxLength: number,
  options: SplitOptions = {}
): Generator<string, void, undefined> {
  if (typeof source !== 'string') {
    throw new InvalidInputTypeError(describeValueType(source));
  }
  if (!source || !(maxLength > 0)) {
    return noFragments();
  }

  const contentType = options.contentType ?? classifyContent(source);

  return contentType === 'html'
    ? splitHtmlContent(source, maxLength, options)
    : splitTextContent(source, maxLength, options);
}
