import {
  ConfigurationError,
  type PersonaProfile,
  type RankedSection,
  type ScoringWeights,
  type SubsectionAnalysis,
} from '@persona-docs/types';
import type { SemanticMatcher } from '../matcher/semantic-matcher.js';
import { personaAlignment } from '../scoring/relevance-scorer.js';
import { splitIntoChunks, type TextChunk } from '../text/sentences.js';
import { tokenize } from '../text/tokenizer.js';

const CHUNK_SEPARATOR = ' ';

export interface SubsectionExtractorOptions {
  /** 全体の重み。semanticSimilarityとpersonaAlignmentのみを再正規化して使う */
  weights: ScoringWeights;
  /** refined_textの最大文字数 */
  maxRefinedLength: number;
}

interface ScoredChunk extends TextChunk {
  score: number;
}

/**
 * 縮約スコアラーの重み（合計1）
 */
export function reducedWeights(weights: ScoringWeights): { semantic: number; alignment: number } {
  const total = weights.semanticSimilarity + weights.personaAlignment;
  if (total <= 0) {
    return { semantic: 0.5, alignment: 0.5 };
  }
  return {
    semantic: weights.semanticSimilarity / total,
    alignment: weights.personaAlignment / total,
  };
}

/**
 * 単語境界で切り詰める（境界がなければ文字数で切る）
 */
export function truncateAtWordBoundary(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  const head = text.slice(0, maxLength);
  const boundary = head.lastIndexOf(' ');
  return (boundary > 0 ? head.slice(0, boundary) : head).trimEnd();
}

/**
 * 上位セクションから代表的な抜粋を作るクラス
 */
export class SubsectionExtractor {
  private readonly weights: { semantic: number; alignment: number };
  private readonly maxRefinedLength: number;

  constructor(
    private readonly matcher: SemanticMatcher,
    private readonly profile: PersonaProfile,
    options: SubsectionExtractorOptions
  ) {
    if (!Number.isInteger(options.maxRefinedLength) || options.maxRefinedLength <= 0) {
      throw new ConfigurationError(
        `maxRefinedLength must be a positive integer (got ${options.maxRefinedLength})`
      );
    }
    this.weights = reducedWeights(options.weights);
    this.maxRefinedLength = options.maxRefinedLength;
  }

  extract(ranked: RankedSection): SubsectionAnalysis {
    return {
      section: ranked.section,
      refinedText: this.refine(ranked.section.text),
      parentImportanceRank: ranked.importanceRank,
    };
  }

  /**
   * 本文を予算内に縮約
   *
   * 1. チャンクがなければ空文字列
   * 2. 予算内ならそのまま
   * 3. スコア順に貪欲に選び、元の順序に並べ直して連結
   */
  refine(text: string): string {
    const chunks = splitIntoChunks(text);
    if (chunks.length === 0) {
      return '';
    }

    if (text.length <= this.maxRefinedLength) {
      return text;
    }

    const ranked = chunks
      .map((chunk): ScoredChunk => ({ ...chunk, score: this.scoreChunk(chunk.text) }))
      .sort((a, b) => b.score - a.score || a.position - b.position);

    const selected: ScoredChunk[] = [];
    let length = 0;
    for (const chunk of ranked) {
      const added = selected.length === 0 ? chunk.text.length : CHUNK_SEPARATOR.length + chunk.text.length;
      if (length + added <= this.maxRefinedLength) {
        selected.push(chunk);
        length += added;
      }
    }

    if (selected.length === 0) {
      // どのチャンクも予算に収まらない場合は最上位チャンクを切り詰める
      return truncateAtWordBoundary(ranked[0].text, this.maxRefinedLength);
    }

    return selected
      .sort((a, b) => a.position - b.position)
      .map((chunk) => chunk.text)
      .join(CHUNK_SEPARATOR);
  }

  private scoreChunk(text: string): number {
    const semantic = this.matcher.similarityOfText(text);
    const alignment = personaAlignment(new Set(tokenize(text)), this.profile);
    return this.weights.semantic * semantic + this.weights.alignment * alignment;
  }
}
