/**
 * analyze コマンド実装
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ConfigLoader,
  ConfigurationError,
  InputError,
  silentLogger,
  type AnalysisResult,
  type ConfigOverrides,
  type Logger,
  type PersonaDocsConfig,
} from '@persona-docs/types';
import { DocumentAnalyzer } from '@persona-docs/engine';
import { loadDocuments, readCollectionInput, toConfigOverrides } from '../input/collection-loader.js';
import { formatResultAsJson, formatResultAsText } from '../utils/output.js';

export interface AnalyzeCommandOptions {
  inputDir?: string;
  output?: string;
  topK?: string;
  cap?: string;
  idealLength?: string;
  timeBudget?: string;
  format?: 'json' | 'text';
  /** テキスト形式でサブスコアの内訳を出す */
  explain?: boolean;
  quiet?: boolean;
  config?: string;
}

export interface RunAnalyzeOptions extends AnalyzeCommandOptions {
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
  /** 時刻の取得（テスト用） */
  now?: () => number;
  logger?: Logger;
}

export interface RunAnalyzeResult {
  result: AnalysisResult;
  /** 整形済みの出力 */
  output: string;
}

/**
 * stdoutは結果の出力に使うため、進捗ログはstderrへ出す
 */
const stderrLogger: Logger = {
  log: (...args) => console.error(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function parseIntegerOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${flag} must be an integer (got "${value}")`);
  }
  return parsed;
}

function parseNumberOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${flag} must be a number (got "${value}")`);
  }
  return parsed;
}

/**
 * CLIオプションを設定の上書きに変換
 */
export function cliOverrides(options: AnalyzeCommandOptions): ConfigOverrides {
  const analysis: NonNullable<ConfigOverrides['analysis']> = {};
  const topK = parseIntegerOption(options.topK, '--top-k');
  if (topK !== undefined) analysis.topK = topK;
  const cap = parseIntegerOption(options.cap, '--cap');
  if (cap !== undefined) analysis.perDocumentCap = cap;
  const idealLength = parseNumberOption(options.idealLength, '--ideal-length');
  if (idealLength !== undefined) analysis.idealLength = idealLength;

  const overrides: ConfigOverrides = { analysis };
  const timeBudget = parseNumberOption(options.timeBudget, '--time-budget');
  if (timeBudget !== undefined) {
    overrides.worker = { timeBudgetSeconds: timeBudget };
  }
  return overrides;
}

/**
 * 設定を解決
 * 優先順位: デフォルト < 設定ファイル < 入力JSONのconfigブロック < CLIオプション
 */
async function resolveConfig(
  inputOverrides: ConfigOverrides,
  options: RunAnalyzeOptions
): Promise<PersonaDocsConfig> {
  const { config } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
  });
  const withInput = ConfigLoader.merge(config, inputOverrides);
  return ConfigLoader.merge(withInput, cliOverrides(options));
}

/**
 * 解析を実行して整形済みの出力を返す（ファイル書き込みを含む）
 * @throws ConfigurationError / InputError
 */
export async function runAnalyze(inputPath: string, options: RunAnalyzeOptions = {}): Promise<RunAnalyzeResult> {
  const cwd = options.cwd ?? process.cwd();
  const logger = options.quiet ? silentLogger : (options.logger ?? stderrLogger);
  const resolvedInput = path.resolve(cwd, inputPath);

  // 1. 入力JSON
  const input = await readCollectionInput(resolvedInput);

  // 2. 設定
  const config = await resolveConfig(toConfigOverrides(input.config), options);

  // 3. 文書の読み込み（デフォルト: 入力JSONと同じディレクトリ）
  const inputDir = options.inputDir ? path.resolve(cwd, options.inputDir) : path.dirname(resolvedInput);
  const documents = await loadDocuments(input, {
    inputDir,
    splitter: config.splitter,
    logger,
  });

  // 4. 解析
  const analyzer = new DocumentAnalyzer({ config, logger, now: options.now });
  const result = await analyzer.analyze({
    documents,
    persona: { role: input.persona.role, task: input.job_to_be_done.task },
  });

  if (options.explain && options.format !== 'text') {
    logger.warn('[Analyze] --explain only applies to --format text; JSON output is unchanged');
  }
  const output =
    options.format === 'text'
      ? formatResultAsText(result, { explain: options.explain })
      : formatResultAsJson(result);

  if (options.output) {
    const outputPath = path.resolve(cwd, options.output);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, output + '\n', 'utf-8');
    logger.log(`[Analyze] Wrote ${outputPath}`);
  }

  return { result, output };
}

/**
 * analyze コマンドを実行
 */
export async function executeAnalyze(inputPath: string, options: AnalyzeCommandOptions): Promise<void> {
  try {
    const { output } = await runAnalyze(inputPath, options);
    if (!options.output) {
      console.log(output);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Error (configuration): ${error.message}`);
    } else if (error instanceof InputError) {
      console.error(`Error (input): ${error.message}`);
    } else if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Error: unknown error');
    }
    process.exit(1);
  }
}
