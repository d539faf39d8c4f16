import { describe, it, expect } from 'vitest';
import { extractWords, isStopword, tokenize } from '../tokenizer.js';
import { previewHeading, splitIntoChunks, splitParagraphs, splitSentences } from '../sentences.js';

describe('tokenizer', () => {
  describe('extractWords', () => {
    it('小文字化して単語に分解する', () => {
      expect(extractWords('Quarterly Revenue, 2023!')).toEqual(['quarterly', 'revenue', '2023']);
    });

    it('& \' - でつながった語は1語として扱う', () => {
      expect(extractWords('R&D long-term don’t')).toEqual(['r&d', 'long-term', "don't"]);
    });

    it('空文字列は空配列', () => {
      expect(extractWords('')).toEqual([]);
    });
  });

  describe('tokenize', () => {
    it('ストップワードと1文字の語を除く', () => {
      expect(tokenize('The cost of a 5 x budget')).toEqual(['cost', 'budget']);
    });

    it('r&dはストップワードに分解されない', () => {
      expect(tokenize('Compare R&D investments')).toEqual(['compare', 'r&d', 'investments']);
    });
  });

  it('isStopword', () => {
    expect(isStopword('the')).toBe(true);
    expect(isStopword('revenue')).toBe(false);
  });
});

describe('sentences', () => {
  it('空行で段落に分割する', () => {
    expect(splitParagraphs('first\n\n  \nsecond\nline\n\n')).toEqual(['first', 'second\nline']);
  });

  it('文末記号の後で文に分割する', () => {
    expect(splitSentences('One. Two!\nThree? Four')).toEqual(['One.', 'Two!', 'Three?', 'Four']);
  });

  it('段落 → 文の順に通し番号を付ける', () => {
    expect(splitIntoChunks('A one. A two.\n\nB one.')).toEqual([
      { position: 0, text: 'A one.' },
      { position: 1, text: 'A two.' },
      { position: 2, text: 'B one.' },
    ]);
  });

  describe('previewHeading', () => {
    it('短い先頭行はそのまま', () => {
      expect(previewHeading('Short line\nsecond line')).toBe('Short line');
    });

    it('長い行は単語境界で切り詰める', () => {
      expect(previewHeading('alpha beta gamma', 12)).toBe('alpha beta…');
    });
  });
});
