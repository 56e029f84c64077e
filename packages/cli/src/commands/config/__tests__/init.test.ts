/**
 * config init コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ConfigLoader } from '@content-splitter/types';
import { initConfig } from '../init.js';

describe('config init', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    // 各テストで独立したディレクトリを作成
    testDir = path.join(tmpdir(), `.test-config-init-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    configPath = path.join(testDir, '.content-splitter.json');
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    // テストディレクトリを削除
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('デフォルト設定で設定ファイルを生成できる', async () => {
    const written = await initConfig({ cwd: testDir });
    expect(written).toBe(configPath);

    const content = await fs.readFile(configPath, 'utf-8');
    expect(JSON.parse(content)).toEqual(ConfigLoader.getDefaultConfig());
    expect(content.endsWith('}\n')).toBe(true);
  });

  it('最大バイト数と出力先を指定できる', async () => {
    await initConfig({ cwd: testDir, maxLength: 2000, outputDirectory: 'out' });

    const config = await ConfigLoader.load(configPath);
    expect(config.split.maxLength).toBe(2000);
    expect(config.output.directory).toBe('out');
  });

  it('CLIから文字列で渡された最大バイト数を数値として書き込む', async () => {
    await initConfig({ cwd: testDir, maxLength: '512' });

    const config = await ConfigLoader.load(configPath);
    expect(config.split.maxLength).toBe(512);
  });

  it.each([
    ['abc', '--max-len must be a number'],
    [Number.NaN, '--max-len must be a number'],
    ['1.5', '--max-len must be an integer'],
    [0, '--max-len must be positive'],
    ['-3', '--max-len must be positive'],
  ])('不正な最大バイト数 %s はsplitと同じメッセージでエラー', async (maxLength, message) => {
    await expect(initConfig({ cwd: testDir, maxLength })).rejects.toThrow(message);
    await expect(fs.access(configPath)).rejects.toThrow();
  });

  it('空の出力先はエラー', async () => {
    await expect(initConfig({ cwd: testDir, outputDirectory: '' })).rejects.toThrow(
      '--out must not be empty'
    );
  });

  it('既存ファイルがある場合はエラーを投げる', async () => {
    await initConfig({ cwd: testDir });

    await expect(initConfig({ cwd: testDir })).rejects.toThrow('Configuration file already exists');
  });

  it('--forceオプションで既存ファイルを上書きできる', async () => {
    await initConfig({ cwd: testDir, maxLength: 100 });
    expect((await ConfigLoader.load(configPath)).split.maxLength).toBe(100);

    await initConfig({ cwd: testDir, maxLength: 200, force: true });
    expect((await ConfigLoader.load(configPath)).split.maxLength).toBe(200);
  });
});
