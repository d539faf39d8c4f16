/**
 * 解析結果の型定義
 */

import type { RankedSection, SubsectionAnalysis } from './section.js';

export interface AnalysisMetadata {
  /** 入力文書のファイル名（入力順） */
  inputDocuments: readonly string[];
  /** ペルソナの役割 */
  persona: string;
  /** タスク */
  jobToBeDone: string;
  /** 処理時刻（ISO 8601） */
  processingTimestamp: string;
  /** スコアリングしたセクション数 */
  totalSectionsAnalyzed: number;
  /** 選択したセクション数 */
  topSectionsSelected: number;
  /** 時間予算を超過して部分結果となったか */
  partial: boolean;
}

/**
 * 1回の実行結果
 *
 * 構築後はfreezeされる
 */
export interface AnalysisResult {
  readonly metadata: Readonly<AnalysisMetadata>;
  readonly extractedSections: readonly RankedSection[];
  readonly subsectionAnalysis: readonly SubsectionAnalysis[];
}
