import { tokenize } from '../text/tokenizer.js';

/**
 * 疎ベクトル（語 → 重み）
 */
export type SparseVector = ReadonlyMap<string, number>;

export interface TfidfVectorizerOptions {
  /** n-gramの範囲（デフォルト: [1, 2]） */
  ngramRange?: readonly [number, number];
}

/**
 * TF-IDFベクトライザ
 *
 * - tf: 出現回数
 * - idf: ln((1 + n) / (1 + df)) + 1
 * - ベクトルはL2正規化
 * - n-gramはストップワード除去後のトークン列から生成
 */
export class TfidfVectorizer {
  private readonly minN: number;
  private readonly maxN: number;
  private idf: Map<string, number> | null = null;

  constructor(options: TfidfVectorizerOptions = {}) {
    const [minN, maxN] = options.ngramRange ?? [1, 2];
    if (!Number.isInteger(minN) || !Number.isInteger(maxN) || minN < 1 || maxN < minN) {
      throw new Error(`Invalid ngramRange: [${minN}, ${maxN}]`);
    }
    this.minN = minN;
    this.maxN = maxN;
  }

  get isFitted(): boolean {
    return this.idf !== null;
  }

  /** 語彙数 */
  get vocabularySize(): number {
    return this.idf?.size ?? 0;
  }

  /**
   * テキストをn-gram列に分解
   */
  analyze(text: string): string[] {
    const tokens = tokenize(text);
    const terms: string[] = [];
    for (let n = this.minN; n <= this.maxN; n++) {
      for (let i = 0; i + n <= tokens.length; i++) {
        terms.push(tokens.slice(i, i + n).join(' '));
      }
    }
    return terms;
  }

  /**
   * コーパス全体から文書頻度を計算
   * 再度呼んだ場合は語彙を作り直す
   */
  fit(corpus: readonly string[]): this {
    const documentFrequency = new Map<string, number>();
    for (const text of corpus) {
      for (const term of new Set(this.analyze(text))) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const n = corpus.length;
    const idf = new Map<string, number>();
    for (const [term, df] of documentFrequency) {
      idf.set(term, Math.log((1 + n) / (1 + df)) + 1);
    }
    this.idf = idf;
    return this;
  }

  /**
   * テキストをベクトル化
   * 語彙にない語は無視する。語が1つもなければ空ベクトル
   */
  transform(text: string): SparseVector {
    const idf = this.idf;
    if (!idf) {
      throw new Error('TfidfVectorizer is not fitted. Call fit() first.');
    }

    const counts = new Map<string, number>();
    for (const term of this.analyze(text)) {
      if (idf.has(term)) {
        counts.set(term, (counts.get(term) ?? 0) + 1);
      }
    }

    const weighted = new Map<string, number>();
    let squaredNorm = 0;
    for (const [term, count] of counts) {
      const weight = count * (idf.get(term) ?? 0);
      weighted.set(term, weight);
      squaredNorm += weight * weight;
    }

    if (squaredNorm === 0) {
      return new Map();
    }

    const norm = Math.sqrt(squaredNorm);
    for (const [term, weight] of weighted) {
      weighted.set(term, weight / norm);
    }
    return weighted;
  }
}

/**
 * コサイン類似度（L2正規化済みベクトル同士の内積）
 * 非負ベクトルなので結果は[0, 1]
 */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, weight] of small) {
    const other = large.get(term);
    if (other !== undefined) {
      dot += weight * other;
    }
  }
  return Math.min(1, Math.max(0, dot));
}
