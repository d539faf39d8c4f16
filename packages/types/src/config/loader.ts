import { readFile, access } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { ConfigOverrides, PersonaDocsConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { assertValidConfig, validateConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .persona-docs.json > persona-docs.json
 */
export const CONFIG_FILE_NAMES = ['.persona-docs.json', 'persona-docs.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス（デフォルト: ./.persona-docs.json）
   * @returns 検証済みの設定オブジェクト
   */
  static async load(configPath: string = './.persona-docs.json'): Promise<PersonaDocsConfig> {
    let content: string;
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);
      content = await readFile(configPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid JSON in config file: ${configPath}`, error);
    }

    // 形のバリデーション → デフォルト値とマージ → 値の検証
    return this.merge(this.getDefaultConfig(), validateConfig(parsed));
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - 設定の読み込み
   */
  static async resolve(
    options: ResolveConfigOptions = {}
  ): Promise<{
    config: PersonaDocsConfig;
    configPath: string | null;
  }> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd(), requireConfig = false } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    // 設定ファイルが必須なのに見つからない場合はエラー
    if (!configPath && requireConfig) {
      throw new ConfigurationError(
        'Configuration file not found. Please create a configuration file.\n' +
        'Run: persona-docs config init'
      );
    }

    const config = configPath
      ? await this.load(configPath)
      : this.getDefaultConfig();

    return { config, configPath };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): PersonaDocsConfig {
    return this.merge(DEFAULT_CONFIG, {});
  }

  /**
   * 設定に上書きを適用して検証する
   * 重みは次元ごとにマージされ、合計は結果に対して検証される
   */
  static merge(base: PersonaDocsConfig, overrides: ConfigOverrides): PersonaDocsConfig {
    const merged: PersonaDocsConfig = {
      version: overrides.version ?? base.version,
      analysis: {
        topK: overrides.analysis?.topK ?? base.analysis.topK,
        weights: {
          ...base.analysis.weights,
          ...overrides.analysis?.weights,
        },
        idealLength: overrides.analysis?.idealLength ?? base.analysis.idealLength,
        perDocumentCap:
          overrides.analysis?.perDocumentCap !== undefined
            ? overrides.analysis.perDocumentCap
            : base.analysis.perDocumentCap,
        maxRefinedLength:
          overrides.analysis?.maxRefinedLength ?? base.analysis.maxRefinedLength,
        prefilter: overrides.analysis?.prefilter ?? base.analysis.prefilter,
      },
      worker: {
        maxConcurrent: overrides.worker?.maxConcurrent ?? base.worker.maxConcurrent,
        timeBudgetSeconds:
          overrides.worker?.timeBudgetSeconds ?? base.worker.timeBudgetSeconds,
      },
      splitter: {
        maxTokensPerSection:
          overrides.splitter?.maxTokensPerSection ?? base.splitter.maxTokensPerSection,
        maxDepth: overrides.splitter?.maxDepth ?? base.splitter.maxDepth,
      },
    };

    assertValidConfig(merged);
    return merged;
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string = process.cwd(),
    traverseUp: boolean = true
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      // 候補ファイルを順に試す
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      // 親を遡らない場合はここで終了
      if (!traverseUp) {
        return null;
      }

      // ルートディレクトリに到達したら終了
      if (currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 優先順位: 明示指定 > 環境変数PERSONA_DOCS_CONFIG > 自動探索
   */
  private static async resolveConfigPath(
    explicitPath?: string,
    cwd: string = process.cwd(),
    traverseUp: boolean = true
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env.PERSONA_DOCS_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }
}
