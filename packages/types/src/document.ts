/**
 * 文書データの型定義
 */

/** 見出しレベル（Title > H1 > H2 > H3 > 段落） */
export const HEADING_LEVELS = ['title', 'H1', 'H2', 'H3', 'paragraph'] as const;

export type HeadingLevel = (typeof HEADING_LEVELS)[number];

export interface Document {
  /** ファイル名（コレクション内で一意） */
  filename: string;
  /** タイトル */
  title: string;
  /** セクション（position昇順） */
  sections: Section[];
}

/**
 * セクションデータの型定義
 *
 * 所属文書はファイル名で参照する（所有はしない）
 */
export interface Section {
  /** セクションID（ベクトルキャッシュのキー） */
  id: string;
  /** 所属文書のファイル名 */
  documentFilename: string;
  /** 見出し */
  heading: string;
  /** 見出しレベル */
  headingLevel: HeadingLevel;
  /** ページ番号（1-indexed） */
  pageNumber: number;
  /** 本文 */
  text: string;
  /** 文書内の順序（0-indexed、文書内で狭義単調増加） */
  position: number;
}

export function isHeadingLevel(value: unknown): value is HeadingLevel {
  return typeof value === 'string' && (HEADING_LEVELS as readonly string[]).includes(value);
}
