import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@persona-docs/types';
import { parseLexicon, matchesCategory, loadDefaultLexicon } from '../lexicon.js';
import {
  PersonaProfileBuilder,
  buildQueryText,
  totalProfileWeight,
  LITERAL_TOKEN_WEIGHT,
} from '../profile-builder.js';

const testLexicon = parseLexicon({
  version: 1,
  categories: [
    { id: 'tester', kind: 'role', triggers: ['tester'], keywords: { coverage: 0.8, defects: 0.6 } },
    { id: 'audit', kind: 'task', triggers: ['audit'], keywords: { coverage: 0.9, findings: 0.7 } },
    { id: 'payments', kind: 'domain', triggers: ['payments'], keywords: { refunds: 0.5 } },
  ],
});

describe('parseLexicon', () => {
  it('カテゴリを種別ごとに構築する', () => {
    expect(testLexicon.categories.map((c) => [c.id, c.kind])).toEqual([
      ['tester', 'role'],
      ['audit', 'task'],
      ['payments', 'domain'],
    ]);
    expect(testLexicon.categories[0].keywords.get('coverage')).toBe(0.8);
  });

  it('キーワードを正規化する', () => {
    const lexicon = parseLexicon({
      version: 1,
      categories: [{ id: 'x', kind: 'role', triggers: ['Tester'], keywords: { Coverage: 0.5 } }],
    });
    expect([...lexicon.categories[0].triggers]).toEqual(['tester']);
    expect([...lexicon.categories[0].keywords.keys()]).toEqual(['coverage']);
  });

  it('1トークンにならない語はエラー', () => {
    expect(() =>
      parseLexicon({
        version: 1,
        categories: [{ id: 'x', kind: 'role', triggers: ['test lead'], keywords: {} }],
      })
    ).toThrow('Lexicon term "test lead" in category "x" must be a single token');
  });

  it('重複したカテゴリIDはエラー', () => {
    const category = { id: 'dup', kind: 'role', triggers: ['tester'], keywords: {} };
    expect(() => parseLexicon({ version: 1, categories: [category, category] })).toThrow(
      'Duplicate lexicon category: dup'
    );
  });

  it('範囲外の重みはエラー', () => {
    expect(() =>
      parseLexicon({
        version: 1,
        categories: [{ id: 'x', kind: 'role', triggers: ['tester'], keywords: { coverage: 1.5 } }],
      })
    ).toThrow();
  });

  it('同梱のレキシコンを読み込める', () => {
    const lexicon = loadDefaultLexicon();
    expect(lexicon.categories.some((c) => c.id === 'financial')).toBe(true);
    expect(loadDefaultLexicon()).toBe(lexicon);
  });
});

describe('matchesCategory', () => {
  const [role, task, domain] = testLexicon.categories;
  const tokens = (words: string[]) => new Set(words);

  it('roleカテゴリは役割のトークンだけで選択される', () => {
    expect(matchesCategory(role, tokens(['tester']), tokens([]))).toBe(true);
    expect(matchesCategory(role, tokens([]), tokens(['tester']))).toBe(false);
  });

  it('taskカテゴリはタスクのトークンだけで選択される', () => {
    expect(matchesCategory(task, tokens([]), tokens(['audit']))).toBe(true);
    expect(matchesCategory(task, tokens(['audit']), tokens([]))).toBe(false);
  });

  it('domainカテゴリはどちらのトークンでも選択される', () => {
    expect(matchesCategory(domain, tokens(['payments']), tokens([]))).toBe(true);
    expect(matchesCategory(domain, tokens([]), tokens(['payments']))).toBe(true);
  });
});

describe('PersonaProfileBuilder', () => {
  const builder = new PersonaProfileBuilder(testLexicon);

  it('役割が空ならConfigurationError', () => {
    expect(() => builder.build({ role: '   ', task: 'audit payments' })).toThrow(ConfigurationError);
    expect(() => builder.build({ role: '', task: 'audit payments' })).toThrow('Persona role must not be empty');
  });

  it('タスクが空ならConfigurationError', () => {
    expect(() => builder.build({ role: 'QA Tester', task: '' })).toThrow(
      'Job-to-be-done task must not be empty'
    );
  });

  it('役割・タスクの語とカテゴリのキーワードを集める', () => {
    const profile = builder.build({ role: ' QA Tester ', task: 'Audit payments' });

    expect(profile.role).toBe('QA Tester');
    expect(profile.task).toBe('Audit payments');
    expect([...profile.focusTags]).toEqual(['tester', 'audit', 'payments']);
    expect(Object.fromEntries(profile.keywords)).toEqual({
      qa: LITERAL_TOKEN_WEIGHT,
      tester: LITERAL_TOKEN_WEIGHT,
      audit: LITERAL_TOKEN_WEIGHT,
      payments: LITERAL_TOKEN_WEIGHT,
      // 複数カテゴリに現れるキーは大きい方の重み
      coverage: 0.9,
      defects: 0.6,
      findings: 0.7,
      refunds: 0.5,
    });
  });

  it('どのカテゴリにも当たらなければ語だけのプロファイル', () => {
    const profile = builder.build({ role: 'Gardener', task: 'Water plants' });
    expect(profile.focusTags.size).toBe(0);
    expect([...profile.keywords.keys()]).toEqual(['gardener', 'water', 'plants']);
  });

  it('プロファイルはfreezeされる', () => {
    const profile = builder.build({ role: 'Tester', task: 'Audit' });
    expect(Object.isFrozen(profile)).toBe(true);
  });

  it('同梱レキシコンでR&Dの語を保持する', () => {
    const profile = new PersonaProfileBuilder().build({
      role: 'Financial Analyst',
      task: 'Compare R&D investments',
    });
    expect(profile.keywords.get('r&d')).toBe(LITERAL_TOKEN_WEIGHT);
    expect([...profile.focusTags].sort()).toEqual(['analyst', 'compare', 'financial']);
    // analyst(0.8)とcompare(0.9)の両方に現れる
    expect(profile.keywords.get('comparison')).toBe(0.9);
  });

  it('buildQueryText: 役割・タスク・キーワード（辞書順）', () => {
    const profile = builder.build({ role: 'Tester', task: 'Audit' });
    expect(buildQueryText(profile)).toBe('Tester Audit audit coverage defects findings tester');
  });

  it('totalProfileWeight', () => {
    const profile = builder.build({ role: 'Tester', task: 'Audit' });
    // tester 1 + audit 1 + coverage 0.9 + defects 0.6 + findings 0.7
    expect(totalProfileWeight(profile)).toBeCloseTo(4.2, 10);
  });
});
