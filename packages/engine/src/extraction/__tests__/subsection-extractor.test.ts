import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_WEIGHTS,
  type PersonaProfile,
  type RankedSection,
} from '@persona-docs/types';
import { SemanticMatcher } from '../../matcher/semantic-matcher.js';
import { SubsectionExtractor, reducedWeights, truncateAtWordBoundary } from '../subsection-extractor.js';

const profile: PersonaProfile = {
  role: 'Analyst',
  task: 'Review budget',
  keywords: new Map([['budget', 1]]),
  focusTags: new Set(),
};

const LONG_TEXT = [
  'Budget allocation rose sharply.',
  'Weather was mild all season.',
  'The budget covers research staff.',
].join(' ');

function createExtractor(maxRefinedLength: number): SubsectionExtractor {
  const matcher = new SemanticMatcher();
  matcher.fit([LONG_TEXT], 'Analyst Review budget budget');
  return new SubsectionExtractor(matcher, profile, { weights: DEFAULT_WEIGHTS, maxRefinedLength });
}

describe('reducedWeights', () => {
  it('類似度と一致度の重みを合計1に再正規化する', () => {
    const weights = reducedWeights(DEFAULT_WEIGHTS);
    expect(weights.semantic).toBeCloseTo(0.625, 10);
    expect(weights.alignment).toBeCloseTo(0.375, 10);
  });

  it('両方0なら等分', () => {
    expect(
      reducedWeights({ ...DEFAULT_WEIGHTS, semanticSimilarity: 0, personaAlignment: 0 })
    ).toEqual({ semantic: 0.5, alignment: 0.5 });
  });
});

describe('truncateAtWordBoundary', () => {
  it('単語境界で切り詰める', () => {
    expect(truncateAtWordBoundary('Budget allocation rose sharply', 20)).toBe('Budget allocation');
  });

  it('境界がなければ文字数で切る', () => {
    expect(truncateAtWordBoundary('abcdefghij', 4)).toBe('abcd');
  });

  it('短いテキストはそのまま', () => {
    expect(truncateAtWordBoundary('short', 20)).toBe('short');
  });
});

describe('SubsectionExtractor', () => {
  it('不正なmaxRefinedLengthはConfigurationError', () => {
    const matcher = new SemanticMatcher();
    expect(
      () => new SubsectionExtractor(matcher, profile, { weights: DEFAULT_WEIGHTS, maxRefinedLength: 0 })
    ).toThrow(ConfigurationError);
  });

  it('本文が空なら空文字列', () => {
    expect(createExtractor(100).refine('')).toBe('');
    expect(createExtractor(100).refine('  \n\n ')).toBe('');
  });

  it('予算内の本文はそのまま', () => {
    expect(createExtractor(500).refine(LONG_TEXT)).toBe(LONG_TEXT);
  });

  it('関連する文を選んで元の順序で連結する', () => {
    const refined = createExtractor(70).refine(LONG_TEXT);
    expect(refined).toBe('Budget allocation rose sharply. The budget covers research staff.');
    expect(refined.length).toBeLessThanOrEqual(70);
  });

  it('どの文も収まらなければ最上位の文を切り詰める', () => {
    const refined = createExtractor(20).refine('Budget allocation rose sharply across every research department.');
    expect(refined).toBe('Budget allocation');
  });

  it('親セクションの順位を引き継ぐ', () => {
    const ranked: RankedSection = {
      section: {
        id: 's1',
        documentFilename: 'report.md',
        heading: 'Budget',
        headingLevel: 'H1',
        pageNumber: 3,
        text: LONG_TEXT,
        position: 0,
      },
      documentIndex: 0,
      scores: {
        semanticSimilarity: 0,
        contentQuality: 0,
        personaAlignment: 0,
        sectionTypeWeight: 0,
        positionImportance: 0,
        lengthAppropriateness: 0,
      },
      relevanceScore: 0.5,
      importanceRank: 4,
    };

    const analysis = createExtractor(500).extract(ranked);
    expect(analysis.parentImportanceRank).toBe(4);
    expect(analysis.section).toBe(ranked.section);
    expect(analysis.refinedText).toBe(LONG_TEXT);
  });
});
