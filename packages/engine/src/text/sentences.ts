/**
 * 文・段落への分割
 */

export interface TextChunk {
  /** 元のテキスト内での順序 */
  position: number;
  text: string;
}

/**
 * 空行で段落に分割
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

/**
 * 文に分割（. ! ? の後の空白で区切る）
 * 段落内の改行は空白として扱う
 */
export function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * 段落 → 文の順に分割したチャンク
 */
export function splitIntoChunks(text: string): TextChunk[] {
  const chunks: TextChunk[] = [];
  for (const paragraph of splitParagraphs(text)) {
    for (const sentence of splitSentences(paragraph)) {
      chunks.push({ position: chunks.length, text: sentence });
    }
  }
  return chunks;
}

/** 見出しのない段落に付ける見出しの最大文字数 */
export const PREVIEW_HEADING_LENGTH = 60;

/**
 * 段落の先頭行から見出しを作る
 * 長い場合は単語境界で切り詰めて末尾に…を付ける
 */
export function previewHeading(text: string, maxLength: number = PREVIEW_HEADING_LENGTH): string {
  const firstLine = text.trim().split('\n')[0]?.trim() ?? '';
  if (firstLine.length <= maxLength) {
    return firstLine;
  }
  const head = firstLine.slice(0, maxLength);
  const boundary = head.lastIndexOf(' ');
  return `${(boundary > 0 ? head.slice(0, boundary) : head).trimEnd()}…`;
}
