/**
 * config init コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, DEFAULT_CONFIG } from '@persona-docs/types';
import { initConfig } from '../init.js';

describe('config init', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    // 各テストで独立したディレクトリを作成
    testDir = path.join('/tmp', `.test-config-init-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    configPath = path.join(testDir, '.persona-docs.json');
    await fs.mkdir(testDir, { recursive: true });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    // テストディレクトリを削除
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('設定ファイルを生成できる', async () => {
    const written = await initConfig({ cwd: testDir });
    expect(written).toBe(configPath);

    // ファイルが存在することを確認
    const exists = await fs.access(configPath).then(() => true).catch(() => false);
    expect(exists).toBe(true);
  });

  it('デフォルト設定が全て含まれている', async () => {
    await initConfig({ cwd: testDir });

    const content = await fs.readFile(configPath, 'utf-8');
    expect(JSON.parse(content)).toEqual(DEFAULT_CONFIG);
    expect(content.endsWith('}\n')).toBe(true);
  });

  it('生成された設定ファイルをそのまま読み込める', async () => {
    await initConfig({ cwd: testDir });
    await expect(ConfigLoader.load(configPath)).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('既存ファイルがある場合はエラーを投げる', async () => {
    // 最初に設定ファイルを作成
    await initConfig({ cwd: testDir });

    // 2回目はエラーになる
    await expect(initConfig({ cwd: testDir })).rejects.toThrow('Configuration file already exists');
  });

  it('--forceオプションで既存ファイルを上書きできる', async () => {
    await fs.writeFile(configPath, JSON.stringify({ analysis: { topK: 3 } }));

    await initConfig({ cwd: testDir, force: true });

    const config = JSON.parse(await fs.readFile(configPath, 'utf-8')) as typeof DEFAULT_CONFIG;
    expect(config.analysis.topK).toBe(DEFAULT_CONFIG.analysis.topK);
  });
});
