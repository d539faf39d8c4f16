/**
 * ペルソナの型定義
 */

export interface PersonaInput {
  /** 役割（例: "Financial Analyst"） */
  role: string;
  /** タスク（例: "Compare R&D investments"） */
  task: string;
}

/**
 * 重み付きキーワードプロファイル
 *
 * 1回の実行につき1度だけ構築し、以後は変更しない
 */
export interface PersonaProfile {
  readonly role: string;
  readonly task: string;
  /** キーワード → 重要度（0 < w <= 1） */
  readonly keywords: ReadonlyMap<string, number>;
  /** マッチしたレキシコンカテゴリID */
  readonly focusTags: ReadonlySet<string>;
}
