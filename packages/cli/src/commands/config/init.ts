/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, type PersonaDocsConfig } from '@persona-docs/types';

export interface ConfigInitOptions {
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

export const CONFIG_FILE_NAME = '.persona-docs.json';

/**
 * config init コマンドを実行
 * @returns 生成した設定ファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, CONFIG_FILE_NAME);

  console.log('Initializing persona-docs configuration...\n');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
      );
    }

    console.log('⚠️  Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }

  const config: PersonaDocsConfig = ConfigLoader.getDefaultConfig();

  const configContent = JSON.stringify(config, null, 2) + '\n';
  await fs.writeFile(configPath, configContent, 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`🎯 Top-K: ${config.analysis.topK}`);
  console.log(`⏱️  Time budget: ${config.worker.timeBudgetSeconds}s\n`);
  console.log('Next steps:');
  console.log(`  1. Review and customize ${CONFIG_FILE_NAME}`);
  console.log('  2. Analyze a collection: persona-docs analyze input.json\n');

  return configPath;
}

/**
 * config init コマンドを実行（CLIエントリ）
 */
export async function executeConfigInit(options: ConfigInitOptions): Promise<void> {
  try {
    await initConfig(options);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
