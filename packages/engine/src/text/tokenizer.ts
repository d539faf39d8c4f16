import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * 単語の正規表現
 * 英数字の連続。内部の & ' - はつなぎとして許可する（例: r&d, don't, long-term）
 */
const WORD_PATTERN = /[\p{L}\p{N}]+(?:[&'-][\p{L}\p{N}]+)*/gu;

/** トークンの最小文字数 */
export const MIN_TOKEN_LENGTH = 2;

const StopwordFileSchema = z.object({
  language: z.string(),
  words: z.array(z.string()),
});

function loadStopwords(): ReadonlySet<string> {
  const content = readFileSync(new URL('../data/stopwords.json', import.meta.url), 'utf-8');
  const parsed = StopwordFileSchema.parse(JSON.parse(content));
  return new Set(parsed.words);
}

const STOPWORDS = loadStopwords();

export function isStopword(word: string): boolean {
  return STOPWORDS.has(word);
}

/**
 * テキストを小文字の単語列に分解（ストップワードも含む）
 */
export function extractWords(text: string): string[] {
  const normalized = text.toLowerCase().replace(/[‘’]/g, "'");
  return normalized.match(WORD_PATTERN) ?? [];
}

/**
 * 検索・照合用のトークン列
 * ストップワードと短すぎる語を除く
 */
export function tokenize(text: string): string[] {
  return extractWords(text).filter(
    (word) => word.length >= MIN_TOKEN_LENGTH && !isStopword(word)
  );
}
