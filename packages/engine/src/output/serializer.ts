/**
 * 解析結果を公開済みのJSON形式に変換
 */

import type { AnalysisOutputJson, AnalysisResult, OutputMetadataJson } from '@persona-docs/types';

/** relevance_scoreの小数桁数 */
const SCORE_DECIMALS = 3;

export function roundScore(score: number): number {
  const factor = 10 ** SCORE_DECIMALS;
  return Math.round(score * factor) / factor;
}

export function toOutputJson(result: AnalysisResult): AnalysisOutputJson {
  const { metadata } = result;

  const metadataJson: OutputMetadataJson = {
    input_documents: [...metadata.inputDocuments],
    persona: metadata.persona,
    job_to_be_done: metadata.jobToBeDone,
    processing_timestamp: metadata.processingTimestamp,
    total_sections_analyzed: metadata.totalSectionsAnalyzed,
    top_sections_selected: metadata.topSectionsSelected,
  };
  // 部分結果のときだけフラグを出力（通常時は公開形式と完全に一致させる）
  if (metadata.partial) {
    metadataJson.is_partial = true;
  }

  return {
    metadata: metadataJson,
    extracted_sections: result.extractedSections.map((ranked) => ({
      document: ranked.section.documentFilename,
      section_title: ranked.section.heading,
      importance_rank: ranked.importanceRank,
      page_number: ranked.section.pageNumber,
      heading_level: ranked.section.headingLevel,
      relevance_score: roundScore(ranked.relevanceScore),
    })),
    subsection_analysis: result.subsectionAnalysis.map((subsection) => ({
      document: subsection.section.documentFilename,
      section_title: subsection.section.heading,
      refined_text: subsection.refinedText,
      page_number: subsection.section.pageNumber,
      parent_importance_rank: subsection.parentImportanceRank,
    })),
  };
}

export function serializeResult(result: AnalysisResult): string {
  return JSON.stringify(toOutputJson(result), null, 2);
}
