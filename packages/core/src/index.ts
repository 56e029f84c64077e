/**
 * @content-splitter/core
 */

export * from './splitter/index.js';
export {
  ContentSplitterError,
  InvalidInputTypeError,
  InvalidInputFormatError,
  type ContentSplitterErrorCode,
} from './errors.js';
