import type { Section } from '@persona-docs/types';
import { tokenize } from '../text/tokenizer.js';
import {
  TfidfVectorizer,
  cosineSimilarity,
  type SparseVector,
} from './tfidf-vectorizer.js';
import { VectorCache } from './vector-cache.js';

export interface SemanticMatcherOptions {
  /** セクションベクトルのキャッシュ（並列フェーズで共有） */
  cache?: VectorCache<SparseVector>;
  /** クエリ語を1つも含まないセクションのベクトル計算を省略する */
  prefilter?: boolean;
}

/**
 * 照合に使うセクションのテキスト（見出し + 本文）
 */
export function sectionMatchingText(section: Section): string {
  return section.heading ? `${section.heading}\n${section.text}` : section.text;
}

/**
 * ペルソナ・タスクとセクションの語彙的類似度を計算するクラス
 *
 * fit()はコレクション全体に対して1度だけ呼ぶ（idfがコーパス全体に依存するため）。
 * fit()前の類似度計算はエラー
 */
export class SemanticMatcher {
  private readonly vectorizer = new TfidfVectorizer({ ngramRange: [1, 2] });
  private readonly cache: VectorCache<SparseVector>;
  private readonly prefilter: boolean;
  private queryVector: SparseVector | null = null;
  private queryTerms: ReadonlySet<string> = new Set();

  constructor(options: SemanticMatcherOptions = {}) {
    this.cache = options.cache ?? new VectorCache<SparseVector>();
    this.prefilter = options.prefilter ?? true;
  }

  get isFitted(): boolean {
    return this.queryVector !== null;
  }

  /** 語彙数 */
  get vocabularySize(): number {
    return this.vectorizer.vocabularySize;
  }

  /** ベクトルキャッシュ */
  get vectorCache(): VectorCache<SparseVector> {
    return this.cache;
  }

  /**
   * 全セクションのテキストとクエリテキストで語彙空間を構築
   */
  fit(sectionTexts: readonly string[], queryText: string): void {
    this.vectorizer.fit([...sectionTexts, queryText]);
    const queryVector = this.vectorizer.transform(queryText);

    // クエリのユニグラム（事前フィルタ用）
    const terms = new Set<string>();
    for (const term of queryVector.keys()) {
      if (!term.includes(' ')) {
        terms.add(term);
      }
    }
    this.queryTerms = terms;
    this.queryVector = queryVector;
  }

  /**
   * セクションとクエリのコサイン類似度（0-1）
   * 本文に語がないセクションは0
   */
  similarity(section: Section): number {
    const queryVector = this.requireQueryVector();

    const bodyTokens = tokenize(section.text);
    if (bodyTokens.length === 0) {
      return 0;
    }

    if (this.prefilter) {
      const headingTokens = tokenize(section.heading);
      if (!this.sharesQueryTerms(bodyTokens) && !this.sharesQueryTerms(headingTokens)) {
        // クエリと共通のユニグラムがなければ内積は必ず0
        return 0;
      }
    }

    const vector = this.cache.getOrCompute(section.id, () =>
      this.vectorizer.transform(sectionMatchingText(section))
    );
    return cosineSimilarity(vector, queryVector);
  }

  /**
   * 任意のテキストとクエリのコサイン類似度（キャッシュしない）
   */
  similarityOfText(text: string): number {
    const queryVector = this.requireQueryVector();
    return cosineSimilarity(this.vectorizer.transform(text), queryVector);
  }

  /**
   * トークン列にクエリのユニグラムが含まれるか
   */
  sharesQueryTerms(tokens: Iterable<string>): boolean {
    for (const token of tokens) {
      if (this.queryTerms.has(token)) {
        return true;
      }
    }
    return false;
  }

  private requireQueryVector(): SparseVector {
    if (!this.queryVector) {
      throw new Error('SemanticMatcher is not fitted. Call fit() before computing similarity.');
    }
    return this.queryVector;
  }
}
