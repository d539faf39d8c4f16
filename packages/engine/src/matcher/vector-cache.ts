/**
 * セクションIDをキーとするベクトルキャッシュ
 *
 * 並列フェーズで共有される唯一の可変構造。
 * 計算関数は同期的に完了するため、キーごとの計算は高々1回になる
 */
export class VectorCache<V> {
  private readonly entries = new Map<string, V>();
  private computed = 0;

  /**
   * キャッシュ済みの値を返す。なければ計算して保存
   */
  getOrCompute(key: string, compute: () => V): V {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = compute();
    this.entries.set(key, value);
    this.computed++;
    return value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /** 計算した回数 */
  get computeCount(): number {
    return this.computed;
  }
}
