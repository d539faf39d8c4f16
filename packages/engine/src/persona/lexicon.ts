/**
 * 役割・タスクのレキシコン
 *
 * カテゴリは種別タグで区別する
 * - role: 役割のトークンで選択
 * - task: タスクのトークンで選択
 * - domain: 役割・タスクどちらのトークンでも選択
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { tokenize } from '../text/tokenizer.js';

export type LexiconCategoryKind = 'role' | 'task' | 'domain';

interface LexiconCategoryBase {
  id: string;
  triggers: ReadonlySet<string>;
  /** キーワード → 重み（0 < w <= 1） */
  keywords: ReadonlyMap<string, number>;
}

export interface RoleCategory extends LexiconCategoryBase {
  kind: 'role';
}

export interface TaskCategory extends LexiconCategoryBase {
  kind: 'task';
}

export interface DomainCategory extends LexiconCategoryBase {
  kind: 'domain';
}

export type LexiconCategory = RoleCategory | TaskCategory | DomainCategory;

export interface Lexicon {
  categories: readonly LexiconCategory[];
}

const LexiconFileSchema = z.object({
  version: z.literal(1),
  categories: z.array(
    z.object({
      id: z.string().min(1),
      kind: z.enum(['role', 'task', 'domain']),
      triggers: z.array(z.string().min(1)).min(1),
      keywords: z.record(z.number().gt(0).lte(1)),
    })
  ),
});

/**
 * キーワードをトークナイザと同じ形に正規化
 * 1トークンにならない語はレキシコンの誤りとして扱う
 */
function normalizeTerm(term: string, categoryId: string): string {
  const tokens = tokenize(term);
  if (tokens.length !== 1) {
    throw new Error(`Lexicon term "${term}" in category "${categoryId}" must be a single token`);
  }
  return tokens[0];
}

/**
 * JSONの内容からレキシコンを構築
 */
export function parseLexicon(data: unknown): Lexicon {
  const file = LexiconFileSchema.parse(data);
  const seen = new Set<string>();

  const categories = file.categories.map((category): LexiconCategory => {
    if (seen.has(category.id)) {
      throw new Error(`Duplicate lexicon category: ${category.id}`);
    }
    seen.add(category.id);

    const triggers = new Set(category.triggers.map((t) => normalizeTerm(t, category.id)));
    const keywords = new Map<string, number>();
    for (const [keyword, weight] of Object.entries(category.keywords)) {
      const term = normalizeTerm(keyword, category.id);
      keywords.set(term, Math.max(weight, keywords.get(term) ?? 0));
    }

    const base = { id: category.id, triggers, keywords };
    switch (category.kind) {
      case 'role':
        return { ...base, kind: 'role' };
      case 'task':
        return { ...base, kind: 'task' };
      case 'domain':
        return { ...base, kind: 'domain' };
    }
  });

  return { categories };
}

let defaultLexicon: Lexicon | null = null;

/**
 * 同梱のレキシコン（data/lexicon.json）を読み込む
 */
export function loadDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    const content = readFileSync(new URL('../data/lexicon.json', import.meta.url), 'utf-8');
    defaultLexicon = parseLexicon(JSON.parse(content));
  }
  return defaultLexicon;
}

/**
 * トークン集合に対してカテゴリが選択されるか
 */
export function matchesCategory(
  category: LexiconCategory,
  roleTokens: ReadonlySet<string>,
  taskTokens: ReadonlySet<string>
): boolean {
  const hit = (tokens: ReadonlySet<string>): boolean =>
    [...category.triggers].some((trigger) => tokens.has(trigger));

  switch (category.kind) {
    case 'role':
      return hit(roleTokens);
    case 'task':
      return hit(taskTokens);
    case 'domain':
      return hit(roleTokens) || hit(taskTokens);
  }
}
