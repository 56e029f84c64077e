/**
 * @content-splitter/types
 * content-splitterの共通型定義
 */

// Fragment
export type {
  ContentType,
  TagHierarchy,
  SavedTag,
  FragmentReport,
} from './fragment.js';

// Config
export type {
  ContentSplitterConfig,
  ContentSplitterConfigInput,
  SplitConfig,
  OutputConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  validateConfig,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './config/index.js';
