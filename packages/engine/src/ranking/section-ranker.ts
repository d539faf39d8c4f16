import { ConfigurationError, type RankedSection, type ScoredSection } from '@persona-docs/types';

export interface SectionRankerOptions {
  /** 選択するセクション数 */
  topK: number;
  /** 1文書あたりの最大選択数（nullで無効） */
  perDocumentCap: number | null;
}

/**
 * 全順序の比較関数
 * 合成スコアの降順、同点は（文書の入力順、文書内position）の昇順
 */
export function compareScoredSections(a: ScoredSection, b: ScoredSection): number {
  if (a.relevanceScore !== b.relevanceScore) {
    return b.relevanceScore - a.relevanceScore;
  }
  if (a.documentIndex !== b.documentIndex) {
    return a.documentIndex - b.documentIndex;
  }
  return a.section.position - b.section.position;
}

/**
 * 全文書のセクションを順位付けし、上位K件を選択するクラス
 */
export class SectionRanker {
  private readonly topK: number;
  private readonly perDocumentCap: number | null;

  constructor(options: SectionRankerOptions) {
    if (!Number.isInteger(options.topK) || options.topK <= 0) {
      throw new ConfigurationError(`topK must be a positive integer (got ${options.topK})`);
    }
    if (
      options.perDocumentCap !== null &&
      (!Number.isInteger(options.perDocumentCap) || options.perDocumentCap <= 0)
    ) {
      throw new ConfigurationError(
        `perDocumentCap must be a positive integer or null (got ${options.perDocumentCap})`
      );
    }
    this.topK = options.topK;
    this.perDocumentCap = options.perDocumentCap;
  }

  /**
   * 順位付けして上位K件を返す（importanceRankは1..N）
   *
   * 文書ごとの上限に達した文書のセクションは飛ばし、
   * 他の文書の次点セクションを繰り上げる
   */
  rank(sections: readonly ScoredSection[]): RankedSection[] {
    const sorted = [...sections].sort(compareScoredSections);
    const selected: ScoredSection[] = [];
    const perDocument = new Map<number, number>();

    for (const scored of sorted) {
      if (selected.length >= this.topK) {
        break;
      }

      if (this.perDocumentCap !== null) {
        const count = perDocument.get(scored.documentIndex) ?? 0;
        if (count >= this.perDocumentCap) {
          continue;
        }
        perDocument.set(scored.documentIndex, count + 1);
      }

      selected.push(scored);
    }

    return selected.map((scored, index) => ({
      ...scored,
      importanceRank: index + 1,
    }));
  }
}
