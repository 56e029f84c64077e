import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { Readable } from 'stream';
import { readSource } from '../input.js';

const TEST_DIR = path.join(tmpdir(), `content-splitter-input-test-${process.pid}`);

describe('readSource', () => {
  beforeAll(async () => {
    await fs.mkdir(TEST_DIR, { recursive: true });
    await fs.writeFile(path.join(TEST_DIR, 'doc.txt'), 'ファイルの内容');
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  it('cwdからの相対パスでファイルを読む', async () => {
    expect(await readSource('doc.txt', { cwd: TEST_DIR })).toBe('ファイルの内容');
  });

  it('"-"の場合は標準入力から読む', async () => {
    const stdin = Readable.from([Buffer.from('ab'), 'cd']);
    expect(await readSource('-', { stdin })).toBe('abcd');
  });

  it('マルチバイト文字がチャンクをまたいでも壊れない', async () => {
    const bytes = Buffer.from('あ', 'utf-8');
    const stdin = Readable.from([bytes.subarray(0, 1), bytes.subarray(1)]);
    expect(await readSource(undefined, { stdin })).toBe('あ');
  });

  it('存在しないファイルはエラー', async () => {
    await expect(readSource('missing.txt', { cwd: TEST_DIR })).rejects.toThrow();
  });
});
