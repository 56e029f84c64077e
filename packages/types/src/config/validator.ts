import type {
  ContentSplitterConfigInput,
  OutputConfig,
  SplitConfig,
} from '../config.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): ContentSplitterConfigInput {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: ContentSplitterConfigInput = {};

  // バージョンのチェック
  if (config.version !== undefined) {
    if (typeof config.version !== 'string') {
      throw new Error('config.version must be a string');
    }
    result.version = config.version;
  }

  // split設定のバリデーション
  if (config.split !== undefined) {
    result.split = validateSplitConfig(config.split);
  }

  // output設定のバリデーション
  if (config.output !== undefined) {
    result.output = validateOutputConfig(config.output);
  }

  return result;
}

function validateSplitConfig(split: unknown): Partial<SplitConfig> {
  if (!isRecord(split)) {
    throw new Error('config.split must be an object');
  }

  const result: Partial<SplitConfig> = {};

  if (split.maxLength !== undefined) {
    if (typeof split.maxLength !== 'number') {
      throw new Error('config.split.maxLength must be a number');
    }
    if (!Number.isInteger(split.maxLength)) {
      throw new Error('config.split.maxLength must be an integer');
    }
    if (split.maxLength <= 0) {
      throw new Error('config.split.maxLength must be positive');
    }
    result.maxLength = split.maxLength;
  }

  if (split.breakLongWords !== undefined) {
    if (typeof split.breakLongWords !== 'boolean') {
      throw new Error('config.split.breakLongWords must be a boolean');
    }
    result.breakLongWords = split.breakLongWords;
  }

  return result;
}

function validateOutputConfig(output: unknown): Partial<OutputConfig> {
  if (!isRecord(output)) {
    throw new Error('config.output must be an object');
  }

  const result: Partial<OutputConfig> = {};

  if (output.directory !== undefined) {
    if (typeof output.directory !== 'string') {
      throw new Error('config.output.directory must be a string');
    }
    if (output.directory.trim() === '') {
      throw new Error('config.output.directory must not be empty');
    }
    result.directory = output.directory;
  }

  if (output.htmlExtension !== undefined) {
    result.htmlExtension = validateExtension(output.htmlExtension, 'htmlExtension');
  }

  if (output.textExtension !== undefined) {
    result.textExtension = validateExtension(output.textExtension, 'textExtension');
  }

  return result;
}

function validateExtension(value: unknown, key: string): string {
  if (typeof value !== 'string') {
    throw new Error(`config.output.${key} must be a string`);
  }
  // 拡張子はドット始まり（例: ".html"）
  if (!/^\.[A-Za-z0-9]+$/.test(value)) {
    throw new Error(`config.output.${key} must start with "." followed by letters or digits`);
  }
  return value;
}
