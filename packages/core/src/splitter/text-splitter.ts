import { byteLength, splitAtByteBoundary } from './byte-length.js';
import type { SplitterLogger, TextSplitOptions } from './options.js';

/** 文末の句読点（. ! ?）に続く空白 */
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

/**
 * 文に分割（前後の空白を除去し、空の文は捨てる）
 */
export function splitSentences(source: string): string[] {
  return source
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * 上限を超える1文を単語単位で詰める
 * 単語のサイズは区切りの空白1バイトを含めて数える
 */
function* packWords(
  sentence: string,
  maxLength: number,
  breakLongWords: boolean,
  logger: SplitterLogger
): Generator<string, void, undefined> {
  const words = sentence.split(/\s+/);
  let packed: string[] = [];
  let packedLength = 0;

  for (const word of words) {
    const wordBytes = byteLength(word);

    if (wordBytes > maxLength) {
      if (breakLongWords) {
        if (packed.length > 0) {
          yield packed.join(' ');
          packed = [];
          packedLength = 0;
        }
        yield* splitAtByteBoundary(word, maxLength);
        continue;
      }
      logger.warn(
        `Single word of ${wordBytes} bytes exceeds maxLength (${maxLength}); emitted without splitting`
      );
    }

    const wordSize = wordBytes + 1;
    if (packedLength + wordSize > maxLength) {
      if (packed.length > 0) {
        yield packed.join(' ');
      }
      packed = [word];
      packedLength = wordSize;
    } else {
      packed.push(word);
      packedLength += wordSize;
    }
  }

  if (packed.length > 0) {
    yield packed.join(' ');
  }
}

/**
 * プレーンテキストを文・単語の境界でフラグメントに分割
 *
 * 文を貪欲に詰め、1文が上限を超える場合のみ単語単位に落とす。
 * 文をつなぐ空白もバイト数に含める。
 */
export function* splitTextContent(
  source: string,
  maxLength: number,
  options: TextSplitOptions = {}
): Generator<string, void, undefined> {
  if (!source || !(maxLength > 0)) {
    return;
  }

  const logger = options.logger ?? console;
  const breakLongWords = options.breakLongWords ?? false;

  let current: string[] = [];
  let currentLength = 0;

  for (const sentence of splitSentences(source)) {
    const sentenceLength = byteLength(sentence);

    if (sentenceLength > maxLength) {
      // 出力順を保つため、溜まっている文を先に確定する
      if (current.length > 0) {
        yield current.join(' ');
        current = [];
        currentLength = 0;
      }
      yield* packWords(sentence, maxLength, breakLongWords, logger);
      continue;
    }

    const joinedLength =
      current.length > 0 ? currentLength + 1 + sentenceLength : sentenceLength;

    if (joinedLength > maxLength) {
      yield current.join(' ');
      current = [sentence];
      currentLength = sentenceLength;
    } else {
      current.push(sentence);
      currentLength = joinedLength;
    }
  }

  if (current.length > 0) {
    yield current.join(' ');
  }
}
