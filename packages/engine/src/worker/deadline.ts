import { ProcessingTimeout } from '@persona-docs/types';

/**
 * 時間予算
 * 作成時刻からの経過時間で判定する
 */
export class Deadline {
  private readonly startedAt: number;

  constructor(
    private readonly budgetMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = now();
  }

  static fromSeconds(seconds: number, now: () => number = Date.now): Deadline {
    return new Deadline(seconds * 1000, now);
  }

  get elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  get expired(): boolean {
    return this.elapsedMs >= this.budgetMs;
  }

  /**
   * @throws ProcessingTimeout 予算を超過している場合
   */
  check(): void {
    const elapsed = this.elapsedMs;
    if (elapsed >= this.budgetMs) {
      throw new ProcessingTimeout(
        `Time budget of ${this.budgetMs}ms exceeded (elapsed: ${elapsed}ms)`,
        elapsed
      );
    }
  }
}
