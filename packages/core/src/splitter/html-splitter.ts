import { byteLength } from './byte-length.js';
import { HtmlFragmentTracker } from './html-fragment-tracker.js';
import type { HtmlSplitOptions, SplitterLogger } from './options.js';

/**
 * 閉じタグを持たない要素（タグ階層に積まない）
 */
const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'source',
  'track',
  'wbr',
]);

type TagKind = 'opening' | 'closing' | 'self-closing' | 'standalone';

interface ParsedTag {
  kind: TagKind;
  name: string;
}

/**
 * タグ内側の先頭にあるタグ名（空白・`/`・`>`まで）
 */
function leadingName(inner: string): string {
  const match = /^[^\s/>]+/.exec(inner);
  return match ? match[0] : '';
}

/**
 * タグの元テキスト（`<`〜`>`）を分類
 */
export function parseTag(rawTag: string): ParsedTag {
  const inner = rawTag.slice(1, -1);

  // コメント・DOCTYPE・処理命令
  if (inner.startsWith('!') || inner.startsWith('?')) {
    return { kind: 'standalone', name: '' };
  }

  if (inner.startsWith('/')) {
    return { kind: 'closing', name: leadingName(inner.slice(1)) };
  }

  const name = leadingName(inner);
  if (inner.endsWith('/')) {
    return { kind: 'self-closing', name };
  }
  if (!name || VOID_ELEMENTS.has(name.toLowerCase())) {
    return { kind: 'standalone', name };
  }
  return { kind: 'opening', name };
}

/**
 * posの`<`から始まるタグの終端（`>`の直後）
 * コメントは`-->`まで（なければ次の`>`まで）。`>`がなければ-1
 */
function findTagEnd(source: string, pos: number): number {
  if (source.startsWith('<!--', pos)) {
    const commentEnd = source.indexOf('-->', pos + 4);
    if (commentEnd !== -1) {
      return commentEnd + 3;
    }
  }
  const end = source.indexOf('>', pos);
  return end === -1 ? -1 : end + 1;
}

function warnIfOversized(
  unit: string,
  label: string,
  maxLength: number,
  logger: SplitterLogger
): void {
  const size = byteLength(unit);
  if (size > maxLength) {
    logger.warn(
      `Single HTML ${label} of ${size} bytes exceeds maxLength (${maxLength}); emitted without splitting`
    );
  }
}

/**
 * HTMLをタグ階層を保ったままフラグメントに分割
 *
 * 各フラグメントは分割時点で開いていたタグを先頭で開き直し、末尾で閉じる。
 * 1つのタグ・1つのテキスト連続部分の途中では分割しないため、
 * それ単独で上限を超える場合はそのフラグメントも上限を超える。
 * 末尾の閉じていないタグは捨てる。
 */
export function* splitHtmlContent(
  source: string,
  maxLength: number,
  options: HtmlSplitOptions = {}
): Generator<string, void, undefined> {
  if (!source || !(maxLength > 0)) {
    return;
  }

  const logger = options.logger ?? console;
  const tracker = new HtmlFragmentTracker(maxLength);
  let pos = 0;

  while (pos < source.length) {
    if (source[pos] === '<') {
      const tagEnd = findTagEnd(source, pos);
      if (tagEnd === -1) {
        break;
      }

      const rawTag = source.slice(pos, tagEnd);
      pos = tagEnd;

      if (tracker.wouldExceed(rawTag) && !tracker.isEmpty) {
        yield tracker.flush();
        tracker.startFragment();
      }

      const tag = parseTag(rawTag);
      if (tag.kind === 'closing') {
        tracker.onClosingTag(tag.name);
      } else if (tag.kind === 'opening') {
        tracker.onOpeningTag(rawTag, tag.name);
      }

      warnIfOversized(rawTag, 'tag', maxLength, logger);
      tracker.addContent(rawTag);
    } else {
      const nextTag = source.indexOf('<', pos);
      const end = nextTag === -1 ? source.length : nextTag;
      const text = source.slice(pos, end);
      pos = end;

      // 空白のみのテキストは捨てる
      if (!text.trim()) {
        continue;
      }

      if (tracker.wouldExceed(text) && !tracker.isEmpty) {
        yield tracker.flush();
        tracker.startFragment();
      }

      warnIfOversized(text, 'text run', maxLength, logger);
      tracker.addContent(text);
    }
  }

  if (!tracker.isEmpty) {
    yield tracker.flush();
  }
}
