import {
  assertValidWeights,
  ConfigurationError,
  SCORE_DIMENSIONS,
  type HeadingLevel,
  type PersonaProfile,
  type ScoredSection,
  type ScoringWeights,
  type Section,
  type SubScores,
} from '@persona-docs/types';
import type { SemanticMatcher } from '../matcher/semantic-matcher.js';
import { totalProfileWeight } from '../persona/profile-builder.js';
import { splitSentences } from '../text/sentences.js';
import { extractWords, tokenize } from '../text/tokenizer.js';

/** 見出しレベルごとの重み（Title > H1 > H2 > H3 > 段落） */
export const SECTION_TYPE_WEIGHTS: Readonly<Record<HeadingLevel, number>> = {
  title: 1.0,
  H1: 0.9,
  H2: 0.8,
  H3: 0.7,
  paragraph: 0.6,
};

/** 文として数える最小文字数 */
const MIN_SENTENCE_LENGTH = 10;

const LIST_MARKER_PATTERN = /^\s*(?:[-*•+]|\d+[.)])\s+/m;

export interface RelevanceScorerOptions {
  weights: ScoringWeights;
  /** 長さスコアが最大になる本文長（文字数） */
  idealLength: number;
}

/** セクションの文書内での位置 */
export interface SectionContext {
  /** 所属文書の入力順 */
  documentIndex: number;
  /** 文書内での序数（0-indexed） */
  ordinal: number;
  /** 文書内のセクション数 */
  sectionCount: number;
}

/**
 * 内容の質（0-1）
 * 語彙の豊かさ・文の数・構造的な手がかり（数字、箇条書き）から算出。本文が空なら0
 */
export function contentQuality(text: string): number {
  const words = extractWords(text);
  if (words.length === 0) {
    return 0;
  }

  const richness = new Set(words).size / words.length;

  const sentenceCount = splitSentences(text).filter(
    (sentence) => sentence.length > MIN_SENTENCE_LENGTH
  ).length;
  let sentenceScore: number;
  if (sentenceCount === 0) {
    sentenceScore = 0;
  } else if (sentenceCount <= 2) {
    sentenceScore = 0.5;
  } else if (sentenceCount <= 15) {
    sentenceScore = 1;
  } else {
    sentenceScore = 0.75;
  }

  let structure = 0;
  if (/\d/.test(text)) structure += 0.5;
  if (LIST_MARKER_PATTERN.test(text)) structure += 0.5;

  return clamp01(0.4 * richness + 0.4 * sentenceScore + 0.2 * structure);
}

/**
 * ペルソナとの一致度（0-1）
 * セクションに含まれるキーワードの重みの合計 / プロファイル全体の重み
 */
export function personaAlignment(tokens: ReadonlySet<string>, profile: PersonaProfile): number {
  const total = totalProfileWeight(profile);
  if (total === 0) {
    return 0;
  }

  let matched = 0;
  for (const [keyword, weight] of profile.keywords) {
    if (tokens.has(keyword)) {
      matched += weight;
    }
  }
  return clamp01(matched / total);
}

/**
 * 文書内の位置による重要度（先頭ほど高い、(0.5, 1]）
 */
export function positionImportance(ordinal: number, sectionCount: number): number {
  if (sectionCount <= 0) {
    return 1;
  }
  return clamp01(1 - 0.5 * (ordinal / sectionCount));
}

/**
 * 長さの適切さ（0-1）
 * 対数スケールの釣鐘型。idealLengthで1、短すぎ・長すぎで減衰
 */
export function lengthAppropriateness(length: number, idealLength: number): number {
  if (length <= 0) {
    return 0;
  }
  const logRatio = Math.log(length / idealLength);
  return Math.exp(-(logRatio * logRatio) / 2);
}

/**
 * 重み付き和（[0, 1]にクリップ）
 */
export function combineScores(scores: SubScores, weights: ScoringWeights): number {
  let total = 0;
  for (const dimension of SCORE_DIMENSIONS) {
    total += weights[dimension] * scores[dimension];
  }
  return clamp01(total);
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * 6次元のサブスコアから合成スコアを算出するクラス
 *
 * マッチャーとプロファイルは読み取り専用で共有される
 */
export class RelevanceScorer {
  private readonly weights: ScoringWeights;
  private readonly idealLength: number;

  /**
   * @throws ConfigurationError 重みまたはidealLengthが不正な場合（スコアリング前に検出）
   */
  constructor(
    private readonly matcher: SemanticMatcher,
    private readonly profile: PersonaProfile,
    options: RelevanceScorerOptions
  ) {
    assertValidWeights(options.weights);
    if (!Number.isFinite(options.idealLength) || options.idealLength <= 0) {
      throw new ConfigurationError(`idealLength must be positive (got ${options.idealLength})`);
    }
    this.weights = { ...options.weights };
    this.idealLength = options.idealLength;
  }

  /**
   * サブスコアを計算
   */
  subScores(section: Section, context: SectionContext): SubScores {
    const tokens = new Set(tokenize(`${section.heading} ${section.text}`));
    return {
      semanticSimilarity: clamp01(this.matcher.similarity(section)),
      contentQuality: contentQuality(section.text),
      personaAlignment: personaAlignment(tokens, this.profile),
      sectionTypeWeight: SECTION_TYPE_WEIGHTS[section.headingLevel],
      positionImportance: positionImportance(context.ordinal, context.sectionCount),
      lengthAppropriateness: lengthAppropriateness(section.text.trim().length, this.idealLength),
    };
  }

  /**
   * セクションをスコアリング
   */
  score(section: Section, context: SectionContext): ScoredSection {
    const scores = this.subScores(section, context);
    return {
      section,
      documentIndex: context.documentIndex,
      scores,
      relevanceScore: combineScores(scores, this.weights),
    };
  }
}
