/**
 * 設定ファイルの型定義
 */

import type { ScoreDimension } from './section.js';

/** 6次元の重み表（合計1.0） */
export type ScoringWeights = Record<ScoreDimension, number>;

export interface PersonaDocsConfig {
  version: string;
  analysis: AnalysisConfig;
  worker: WorkerConfig;
  splitter: SplitterConfig;
}

export interface AnalysisConfig {
  /** 選択するセクション数 */
  topK: number;
  /** スコアの重み */
  weights: ScoringWeights;
  /** 長さスコアが最大になる本文長（文字数） */
  idealLength: number;
  /** 1文書あたりの最大選択数（nullで無効） */
  perDocumentCap: number | null;
  /** refined_textの最大文字数 */
  maxRefinedLength: number;
  /** クエリ語を1つも含まないセクションのベクトル計算を省略するか */
  prefilter: boolean;
}

export interface WorkerConfig {
  /** 最大並行処理数 */
  maxConcurrent: number;
  /** 時間予算（秒）。超過時は部分結果を返す */
  timeBudgetSeconds: number;
}

export interface SplitterConfig {
  /** セクションあたりの最大トークン数（超過は警告のみ） */
  maxTokensPerSection: number;
  /** 分割する最大見出し深度（1-3） */
  maxDepth: number;
}

/**
 * 部分的な設定（設定ファイル・入力JSON・CLIオプションからの上書き）
 */
export interface ConfigOverrides {
  version?: string;
  analysis?: Partial<Omit<AnalysisConfig, 'weights'>> & {
    weights?: Partial<ScoringWeights>;
  };
  worker?: Partial<WorkerConfig>;
  splitter?: Partial<SplitterConfig>;
}

/**
 * デフォルトの重み
 *
 * semanticSimilarityは0.25（他の5次元と合わせて1.0になる配分）。
 * 0.40の配分を使う場合はweightsで上書きする
 */
export const DEFAULT_WEIGHTS: ScoringWeights = {
  semanticSimilarity: 0.25,
  contentQuality: 0.2,
  personaAlignment: 0.15,
  sectionTypeWeight: 0.15,
  positionImportance: 0.15,
  lengthAppropriateness: 0.1,
};

/** デフォルト設定 */
export const DEFAULT_CONFIG: PersonaDocsConfig = {
  version: '1.0',
  analysis: {
    topK: 50,
    weights: DEFAULT_WEIGHTS,
    idealLength: 400,
    perDocumentCap: null,
    maxRefinedLength: 500,
    prefilter: true,
  },
  worker: {
    maxConcurrent: 4,
    timeBudgetSeconds: 60,
  },
  splitter: {
    maxTokensPerSection: 2000,
    maxDepth: 3,
  },
};
