import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_WEIGHTS,
  type PersonaProfile,
  type Section,
  type SubScores,
} from '@persona-docs/types';
import { SemanticMatcher, sectionMatchingText } from '../../matcher/semantic-matcher.js';
import {
  RelevanceScorer,
  SECTION_TYPE_WEIGHTS,
  combineScores,
  contentQuality,
  lengthAppropriateness,
  personaAlignment,
  positionImportance,
} from '../relevance-scorer.js';

function makeSection(overrides: Partial<Section> = {}): Section {
  return {
    id: 's1',
    documentFilename: 'report.md',
    heading: 'Budget Allocation',
    headingLevel: 'H1',
    pageNumber: 2,
    text: 'The research budget allocation grew by 12 percent this year.',
    position: 0,
    ...overrides,
  };
}

const profile: PersonaProfile = {
  role: 'Analyst',
  task: 'Review budget',
  keywords: new Map([
    ['budget', 0.75],
    ['revenue', 0.25],
  ]),
  focusTags: new Set(),
};

describe('contentQuality', () => {
  it('本文が空なら0', () => {
    expect(contentQuality('')).toBe(0);
    expect(contentQuality('  \n ')).toBe(0);
  });

  it('語彙・文の数・数字・箇条書きから算出する', () => {
    // richness 1、文2つ → 0.5、数字と箇条書き → 1
    expect(contentQuality('Revenue grew 12 percent.\n- costs fell')).toBeCloseTo(0.8, 10);
  });

  it('短い文は数えない', () => {
    // richness 0.5、文0、構造0
    expect(contentQuality('word word')).toBeCloseTo(0.2, 10);
  });
});

describe('personaAlignment', () => {
  it('含まれるキーワードの重みの割合', () => {
    expect(personaAlignment(new Set(['budget', 'other']), profile)).toBeCloseTo(0.75, 10);
    expect(personaAlignment(new Set(['budget', 'revenue']), profile)).toBeCloseTo(1, 10);
  });

  it('キーワードのないプロファイルは0', () => {
    expect(personaAlignment(new Set(['budget']), { ...profile, keywords: new Map() })).toBe(0);
  });
});

describe('positionImportance', () => {
  it('先頭ほど高い', () => {
    expect(positionImportance(0, 4)).toBe(1);
    expect(positionImportance(2, 4)).toBe(0.75);
    expect(positionImportance(3, 4)).toBe(0.625);
  });

  it('セクション数0なら1', () => {
    expect(positionImportance(0, 0)).toBe(1);
  });
});

describe('lengthAppropriateness', () => {
  it('idealLengthで1', () => {
    expect(lengthAppropriateness(400, 400)).toBe(1);
  });

  it('長さ0は0', () => {
    expect(lengthAppropriateness(0, 400)).toBe(0);
  });

  it('対数スケールで対称に減衰する', () => {
    expect(lengthAppropriateness(200, 400)).toBeCloseTo(lengthAppropriateness(800, 400), 12);
    expect(lengthAppropriateness(400 * Math.E, 400)).toBeCloseTo(Math.exp(-0.5), 12);
  });
});

describe('combineScores', () => {
  const ones: SubScores = {
    semanticSimilarity: 1,
    contentQuality: 1,
    personaAlignment: 1,
    sectionTypeWeight: 1,
    positionImportance: 1,
    lengthAppropriateness: 1,
  };

  it('重み付き和', () => {
    expect(combineScores(ones, DEFAULT_WEIGHTS)).toBeCloseTo(1, 10);
    expect(combineScores({ ...ones, semanticSimilarity: 0 }, DEFAULT_WEIGHTS)).toBeCloseTo(0.75, 10);
  });
});

describe('RelevanceScorer', () => {
  const section = makeSection();
  const empty = makeSection({ id: 's2', heading: 'Budget', text: '', position: 1 });

  function fittedMatcher(): SemanticMatcher {
    const matcher = new SemanticMatcher();
    matcher.fit([section, empty].map(sectionMatchingText), 'Analyst Review budget budget revenue');
    return matcher;
  }

  it('不正な重みはConfigurationError', () => {
    expect(
      () =>
        new RelevanceScorer(fittedMatcher(), profile, {
          weights: { ...DEFAULT_WEIGHTS, semanticSimilarity: 0.5 },
          idealLength: 400,
        })
    ).toThrow(ConfigurationError);
    expect(
      () =>
        new RelevanceScorer(fittedMatcher(), profile, {
          weights: { ...DEFAULT_WEIGHTS, semanticSimilarity: -0.25, contentQuality: 0.7 },
          idealLength: 400,
        })
    ).toThrow('weights.semanticSimilarity must be non-negative (got -0.25)');
  });

  it('不正なidealLengthはConfigurationError', () => {
    expect(
      () => new RelevanceScorer(fittedMatcher(), profile, { weights: DEFAULT_WEIGHTS, idealLength: 0 })
    ).toThrow('idealLength must be positive (got 0)');
  });

  it('6次元のサブスコアを計算する', () => {
    const scorer = new RelevanceScorer(fittedMatcher(), profile, { weights: DEFAULT_WEIGHTS, idealLength: 400 });
    const scores = scorer.subScores(section, { documentIndex: 0, ordinal: 1, sectionCount: 4 });

    expect(scores.semanticSimilarity).toBeGreaterThan(0);
    expect(scores.personaAlignment).toBeCloseTo(0.75, 10);
    expect(scores.sectionTypeWeight).toBe(SECTION_TYPE_WEIGHTS.H1);
    expect(scores.positionImportance).toBe(0.875);
    expect(scores.lengthAppropriateness).toBeCloseTo(
      lengthAppropriateness(section.text.length, 400),
      12
    );
  });

  it('本文が空のセクションは類似度・質・長さが0', () => {
    const scorer = new RelevanceScorer(fittedMatcher(), profile, { weights: DEFAULT_WEIGHTS, idealLength: 400 });
    const scored = scorer.score(empty, { documentIndex: 0, ordinal: 1, sectionCount: 2 });

    expect(scored.scores.semanticSimilarity).toBe(0);
    expect(scored.scores.contentQuality).toBe(0);
    expect(scored.scores.lengthAppropriateness).toBe(0);
    expect(scored.relevanceScore).toBeGreaterThanOrEqual(0);
    expect(scored.relevanceScore).toBeLessThanOrEqual(1);
  });

  it('合成スコアは重み付き和で[0, 1]に収まる', () => {
    const scorer = new RelevanceScorer(fittedMatcher(), profile, { weights: DEFAULT_WEIGHTS, idealLength: 400 });
    const scored = scorer.score(section, { documentIndex: 3, ordinal: 0, sectionCount: 2 });

    expect(scored.documentIndex).toBe(3);
    expect(scored.section).toBe(section);
    expect(scored.relevanceScore).toBeCloseTo(combineScores(scored.scores, DEFAULT_WEIGHTS), 12);
    expect(scored.relevanceScore).toBeGreaterThan(0);
    expect(scored.relevanceScore).toBeLessThanOrEqual(1);
  });
});
