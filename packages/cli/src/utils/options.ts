/**
 * コマンド間で共有するオプションの検証ルール
 */

import { z } from 'zod';

/** --max-len（文字列で受け取った値も数値化する） */
export const maxLenSchema = z.coerce
  .number({ invalid_type_error: '--max-len must be a number' })
  .int('--max-len must be an integer')
  .positive('--max-len must be positive');

/** --out */
export const outSchema = z.string().min(1, '--out must not be empty');

/**
 * 検証エラーを1行のメッセージにまとめる
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join(', ');
}
