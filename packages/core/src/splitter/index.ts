/**
 * Splitter exports
 */

export { splitContent, classifyContent } from './split-content.js';
export { splitHtmlContent, parseTag } from './html-splitter.js';
export { splitTextContent, splitSentences } from './text-splitter.js';
export { HtmlFragmentTracker } from './html-fragment-tracker.js';
export { containsHtmlElement, detectContentType } from './classifier.js';
export { byteLength, splitAtByteBoundary } from './byte-length.js';
export type {
  SplitOptions,
  HtmlSplitOptions,
  TextSplitOptions,
  SplitterLogger,
} from './options.js';
