/**
 * 入力読み込みユーティリティ
 */

import { readFile } from 'fs/promises';
import * as path from 'path';

/**
 * 分割対象のテキストを読み込む
 * ファイル未指定または "-" の場合は標準入力から読む
 */
export async function readSource(
  file: string | undefined,
  options: { cwd?: string; stdin?: NodeJS.ReadableStream } = {}
): Promise<string> {
  if (!file || file === '-') {
    return await readStream(options.stdin ?? process.stdin);
  }
  const filePath = path.resolve(options.cwd || process.cwd(), file);
  return await readFile(filePath, 'utf-8');
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}
