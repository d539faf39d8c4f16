/**
 * 出力フォーマットユーティリティ
 */

import {
  SCORE_DIMENSIONS,
  type AnalysisResult,
  type ScoreDimension,
  type ScoreDimensionJson,
  type SubScores,
} from '@persona-docs/types';
import { roundScore, serializeResult } from '@persona-docs/engine';

/**
 * 解析結果を公開JSON形式で出力
 */
export function formatResultAsJson(result: AnalysisResult): string {
  return serializeResult(result);
}

export interface TextFormatOptions {
  /** 各セクションの下にサブスコアの内訳を出す */
  explain?: boolean;
}

const SCORE_LABELS: Record<ScoreDimension, ScoreDimensionJson> = {
  semanticSimilarity: 'semantic_similarity',
  contentQuality: 'content_quality',
  personaAlignment: 'persona_alignment',
  sectionTypeWeight: 'section_type_weight',
  positionImportance: 'position_importance',
  lengthAppropriateness: 'length_appropriateness',
};

/**
 * サブスコアの内訳（1次元1行）
 */
export function formatScoreBreakdown(scores: SubScores): string[] {
  return SCORE_DIMENSIONS.map(
    (dimension) => `   - ${SCORE_LABELS[dimension]}: ${roundScore(scores[dimension]).toFixed(3)}`
  );
}

/**
 * refined_textのプレビュー（1行に収める）
 */
function getPreviewText(text: string, maxChars: number = 160): string {
  const singleLine = text.replace(/\s+/g, ' ').trim();
  if (singleLine.length <= maxChars) {
    return singleLine;
  }
  return `${singleLine.slice(0, maxChars)}...`;
}

/**
 * 解析結果をテキスト形式で出力
 */
export function formatResultAsText(result: AnalysisResult, options: TextFormatOptions = {}): string {
  const { metadata } = result;
  const lines: string[] = [];

  lines.push(`Persona: ${metadata.persona}`);
  lines.push(`Task: ${metadata.jobToBeDone}`);
  lines.push(
    `Selected ${metadata.topSectionsSelected} of ${metadata.totalSectionsAnalyzed} sections` +
    ` from ${metadata.inputDocuments.length} documents${metadata.partial ? ' (partial)' : ''}`
  );

  if (result.extractedSections.length === 0) {
    return lines.join('\n');
  }

  lines.push('');
  const refinedByRank = new Map(
    result.subsectionAnalysis.map((subsection) => [subsection.parentImportanceRank, subsection.refinedText])
  );

  for (const ranked of result.extractedSections) {
    const { section } = ranked;
    lines.push(`${ranked.importanceRank}. ${section.documentFilename} > ${section.heading || '(no heading)'}`);
    lines.push(
      [
        `Level: ${section.headingLevel}`,
        `Page: ${section.pageNumber}`,
        `Score: ${roundScore(ranked.relevanceScore).toFixed(3)}`,
      ].join(' | ')
    );
    if (options.explain) {
      lines.push(...formatScoreBreakdown(ranked.scores));
    }

    const refined = refinedByRank.get(ranked.importanceRank);
    if (refined) {
      lines.push(`   ${getPreviewText(refined)}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
