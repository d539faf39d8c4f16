/**
 * 入出力JSONの型定義
 *
 * フィールド名は公開済みのJSON形式に合わせてsnake_caseのまま
 */

import type { HeadingLevel } from './document.js';

// ========================================
// Input
// ========================================

export interface CollectionInputJson {
  documents: Array<{ filename: string; title?: string }>;
  persona: { role: string };
  job_to_be_done: { task: string };
  config?: AnalysisOptionsJson;
}

/** 入力JSONのconfigブロック */
export interface AnalysisOptionsJson {
  top_k?: number;
  weights?: Partial<Record<ScoreDimensionJson, number>>;
  ideal_length?: number;
  per_document_cap?: number | null;
  time_budget_seconds?: number;
  max_refined_length?: number;
}

export type ScoreDimensionJson =
  | 'semantic_similarity'
  | 'content_quality'
  | 'persona_alignment'
  | 'section_type_weight'
  | 'position_importance'
  | 'length_appropriateness';

// ========================================
// Output
// ========================================

export interface AnalysisOutputJson {
  metadata: OutputMetadataJson;
  extracted_sections: ExtractedSectionJson[];
  subsection_analysis: SubsectionAnalysisJson[];
}

export interface OutputMetadataJson {
  input_documents: string[];
  persona: string;
  job_to_be_done: string;
  processing_timestamp: string;
  total_sections_analyzed: number;
  top_sections_selected: number;
  /** 部分結果の場合のみ出力 */
  is_partial?: true;
}

export interface ExtractedSectionJson {
  document: string;
  section_title: string;
  importance_rank: number;
  page_number: number;
  heading_level: HeadingLevel;
  relevance_score: number;
}

export interface SubsectionAnalysisJson {
  document: string;
  section_title: string;
  refined_text: string;
  page_number: number;
  parent_importance_rank: number;
}
