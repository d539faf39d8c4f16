import { ConfigurationError, type PersonaInput, type PersonaProfile } from '@persona-docs/types';
import { tokenize } from '../text/tokenizer.js';
import { loadDefaultLexicon, matchesCategory, type Lexicon } from './lexicon.js';

/** 役割・タスクに直接現れた語の重み */
export const LITERAL_TOKEN_WEIGHT = 1.0;

/**
 * 役割とタスクから重み付きキーワードプロファイルを構築するクラス
 */
export class PersonaProfileBuilder {
  constructor(private readonly lexicon: Lexicon = loadDefaultLexicon()) {}

  /**
   * プロファイルを構築
   * @throws ConfigurationError 役割またはタスクが空の場合
   */
  build(input: PersonaInput): PersonaProfile {
    const role = input.role.trim();
    const task = input.task.trim();

    if (!role) {
      throw new ConfigurationError('Persona role must not be empty');
    }
    if (!task) {
      throw new ConfigurationError('Job-to-be-done task must not be empty');
    }

    const roleTokens = new Set(tokenize(role));
    const taskTokens = new Set(tokenize(task));

    const keywords = new Map<string, number>();
    const assign = (keyword: string, weight: number): void => {
      // 同じキーは大きい方の重みを採用
      keywords.set(keyword, Math.max(weight, keywords.get(keyword) ?? 0));
    };

    for (const token of [...roleTokens, ...taskTokens]) {
      assign(token, LITERAL_TOKEN_WEIGHT);
    }

    const focusTags = new Set<string>();
    for (const category of this.lexicon.categories) {
      if (!matchesCategory(category, roleTokens, taskTokens)) {
        continue;
      }
      focusTags.add(category.id);
      for (const [keyword, weight] of category.keywords) {
        assign(keyword, weight);
      }
    }

    return Object.freeze({
      role,
      task,
      keywords,
      focusTags,
    });
  }
}

/**
 * マッチャーに渡すペルソナのクエリテキスト
 * 役割・タスク・キーワード（辞書順）を連結
 */
export function buildQueryText(profile: PersonaProfile): string {
  const keywords = [...profile.keywords.keys()].sort();
  return [profile.role, profile.task, ...keywords].join(' ');
}

/**
 * プロファイルの重みの合計
 */
export function totalProfileWeight(profile: PersonaProfile): number {
  let total = 0;
  for (const weight of profile.keywords.values()) {
    total += weight;
  }
  return total;
}
