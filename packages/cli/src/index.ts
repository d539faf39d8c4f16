#!/usr/bin/env tsx
/**
 * persona-docs CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { executeAnalyze, type AnalyzeCommandOptions } from './commands/analyze.js';
import { executeConfigInit } from './commands/config/init.js';

// package.jsonからバージョンを読み込む
const packageJson = JSON.parse(
  readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
) as {
  version: string;
};

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('persona-docs')
  .description('ペルソナとタスクに応じて文書コレクションから重要なセクションを抽出する')
  .version(packageJson.version)
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス')
      .env('PERSONA_DOCS_CONFIG')
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// analyze コマンド
program
  .command('analyze')
  .description('文書コレクションを解析')
  .argument('<input>', '入力JSON（文書リスト・ペルソナ・タスク）')
  .option('--input-dir <dir>', '文書ファイルのディレクトリ（デフォルト: 入力JSONと同じ場所）')
  .option('-o, --output <path>', '出力ファイルのパス（デフォルト: 標準出力）')
  .option('--top-k <n>', '選択するセクション数')
  .option('--cap <n>', '1文書あたりの最大選択数')
  .option('--ideal-length <n>', '長さスコアが最大になる本文長')
  .option('--time-budget <seconds>', '時間予算（秒）')
  .addOption(
    new Option('--format <format>', '出力形式').choices(['json', 'text']).default('json')
  )
  .option('--explain', 'テキスト形式で各セクションのサブスコアの内訳を出力')
  .option('-q, --quiet', '進捗ログを出力しない')
  .action((input: string, options: AnalyzeCommandOptions) => {
    void executeAnalyze(input, { ...options, config: globalConfigPath });
  });

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('-f, --force', '既存ファイルを上書き')
  .action((options: { force?: boolean }) => {
    void executeConfigInit(options);
  });

// コマンドラインを解析
program.parse(process.argv);
