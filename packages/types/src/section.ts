/**
 * スコア付きセクションの型定義
 */

import type { Section } from './document.js';

/** スコアの6次元（並び順は出力・重み表で共通） */
export const SCORE_DIMENSIONS = [
  'semanticSimilarity',
  'contentQuality',
  'personaAlignment',
  'sectionTypeWeight',
  'positionImportance',
  'lengthAppropriateness',
] as const;

export type ScoreDimension = (typeof SCORE_DIMENSIONS)[number];

/** 各次元のサブスコア（すべて0-1） */
export type SubScores = Record<ScoreDimension, number>;

export interface ScoredSection {
  section: Section;
  /** 所属文書の入力順（タイブレーク用） */
  documentIndex: number;
  scores: SubScores;
  /** 合成スコア（0-1） */
  relevanceScore: number;
}

export interface RankedSection extends ScoredSection {
  /** 重要度順位（1-indexed、欠番なし） */
  importanceRank: number;
}

export interface SubsectionAnalysis {
  section: Section;
  /** 抽出後のテキスト（maxRefinedLength以下） */
  refinedText: string;
  parentImportanceRank: number;
}
