/**
 * content-splitterのエラー定義
 */

export type ContentSplitterErrorCode = 'INVALID_INPUT_TYPE' | 'INVALID_INPUT_FORMAT';

/**
 * 分割処理のエラー基底クラス
 */
export class ContentSplitterError extends Error {
  constructor(
    message: string,
    public readonly code: ContentSplitterErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ContentSplitterError';
  }
}

/**
 * 入力が文字列でない
 */
export class InvalidInputTypeError extends ContentSplitterError {
  constructor(public readonly receivedType: string) {
    super(`Input must be a string (received ${receivedType})`, 'INVALID_INPUT_TYPE');
    this.name = 'InvalidInputTypeError';
  }
}

/**
 * 入力種別の判定中に想定外のエラーが発生した
 * 元のエラーはcauseに保持する
 */
export class InvalidInputFormatError extends ContentSplitterError {
  constructor(cause: unknown) {
    super('Invalid input format', 'INVALID_INPUT_FORMAT', { cause });
    this.name = 'InvalidInputFormatError';
  }
}

/**
 * エラーメッセージ用に値の型を表す文字列を返す
 * （null / array / number / object など）
 */
export function describeValueType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
